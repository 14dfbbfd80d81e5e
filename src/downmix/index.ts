export { Catalog, CatalogLoadError, loadCatalog, type CatalogData } from "./catalog.js";
export {
  COEFF_HARD_LIMIT,
  COEFF_SOFT_LIMIT,
  SUM_ABS_ERROR_LIMIT,
  SUM_ABS_WARN_LIMIT,
} from "./coefficients.js";
export {
  FixtureLoadError,
  discoverFixtures,
  loadFixture,
  runFixture,
  type FixtureResult,
  type PolicyFixture,
} from "./fixtures.js";
export { IssueCollector, compareIssues, countIssues, exitCodeFor, sortIssues } from "./issues.js";
export {
  DownmixResolveError,
  DownmixResolver,
  composeMatrices,
  formatMatrixCsv,
  type DenseMatrix,
  type MatrixBody,
  type Resolution,
  type ResolveErrorCode,
} from "./resolver.js";
export { runValidation, validateRegistry, type ValidateOptions, type ValidationRun } from "./validator.js";
export * from "./types.js";
