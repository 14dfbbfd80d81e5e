import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { loadCatalog, type Catalog } from "../../src/downmix/catalog.js";
import {
  composeMatrices,
  DownmixResolveError,
  DownmixResolver,
  formatMatrixCsv,
} from "../../src/downmix/resolver.js";
import { runValidation } from "../../src/downmix/validator.js";
import { setTestSink, type TelemetryData } from "../../src/utils/telemetry.js";
import {
  createWorkspace,
  matrix,
  policyPack,
  rearFold,
  registry,
  SHIPPED_ONTOLOGY_DIR,
  SHIPPED_REGISTRY,
  stereoFold,
  TEST_POLICY,
  testCatalog,
  type Workspace,
} from "../helpers/downmix-workspace.js";

const STANDARD = "POLICY.DOWNMIX.STANDARD_FOLDOWN_V0";
const IMMERSIVE = "POLICY.DOWNMIX.IMMERSIVE_FOLDOWN_V0";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("DownmixResolver over the shipped registry", () => {
  let catalog: Catalog;
  let resolver: DownmixResolver;

  beforeAll(async () => {
    catalog = await loadCatalog(SHIPPED_ONTOLOGY_DIR);
    resolver = DownmixResolver.fromRun(await runValidation(SHIPPED_REGISTRY, catalog));
  });

  afterEach(() => {
    setTestSink(null);
  });

  it("lists policies in sorted order", () => {
    expect(resolver.listPolicyIds()).toEqual([IMMERSIVE, STANDARD]);
  });

  it("returns registry-declared supports lists", () => {
    const policy = resolver.getPolicy(IMMERSIVE);
    expect(policy.label).toBe("Immersive fold-down (height layers into beds)");
    expect(policy.supports_source_layouts).toEqual(["LAYOUT.5_1_4", "LAYOUT.7_1_4"]);
    expect(policy.supports_target_layouts).toEqual(["LAYOUT.5_1", "LAYOUT.7_1"]);
  });

  it("derives supports lists from the pack's matrices when none are declared", () => {
    const policy = resolver.getPolicy(` ${STANDARD} `);
    expect(policy.supports_source_layouts).toEqual(["LAYOUT.2_0", "LAYOUT.5_1", "LAYOUT.7_1"]);
    expect(policy.supports_target_layouts).toEqual(["LAYOUT.1_0", "LAYOUT.2_0", "LAYOUT.5_1"]);
  });

  it("lists known policies when the ID is unknown", () => {
    expect(() => resolver.getPolicy("POLICY.DOWNMIX.NOPE")).toThrow(
      `Unknown policy_id: POLICY.DOWNMIX.NOPE. Known policy_ids: ${IMMERSIVE}, ${STANDARD}`
    );
    expect(() => resolver.getPolicy("  ")).toThrow("policy_id must be a non-empty string.");
  });

  it("returns the default policy for a source layout", () => {
    expect(resolver.defaultPolicyForSource("LAYOUT.7_1_4")).toBe(IMMERSIVE);
    expect(resolver.defaultPolicyForSource("LAYOUT.1_0")).toBeUndefined();
  });

  it("resolves a direct conversion", () => {
    expect(resolver.resolve(undefined, "LAYOUT.5_1", "LAYOUT.2_0")).toEqual({
      source_layout_id: "LAYOUT.5_1",
      target_layout_id: "LAYOUT.2_0",
      policy_id: STANDARD,
      matrix_id: "DMX.STD.5_1_TO_2_0.LO_RO_LFE_DROP",
    });
  });

  it("resolves a composition path when no direct conversion exists", () => {
    const resolution = resolver.resolve(undefined, "LAYOUT.7_1_4", "LAYOUT.2_0");
    expect("steps" in resolution ? resolution.steps.map((s) => s.matrix_id) : []).toEqual([
      "DMX.IMM.7_1_4_TO_7_1",
      "DMX.STD.7_1_TO_5_1",
      "DMX.STD.5_1_TO_2_0.LO_RO_LFE_DROP",
    ]);
    expect(resolution.policy_id).toBe(IMMERSIVE);
  });

  it("names the known source layouts when nothing matches", () => {
    expect(() => resolver.resolve(undefined, "LAYOUT.1_0", "LAYOUT.2_0")).toThrow(
      "No conversion found: LAYOUT.1_0 -> LAYOUT.2_0. Known source layouts: LAYOUT.2_0, LAYOUT.5_1, LAYOUT.5_1_4, LAYOUT.7_1, LAYOUT.7_1_4"
    );
  });

  it("builds a dense matrix in layout channel order", () => {
    const dense = resolver.buildMatrix(STANDARD, "DMX.STD.2_0_TO_1_0");
    expect(dense).toEqual({
      matrix_id: "DMX.STD.2_0_TO_1_0",
      source_layout_id: "LAYOUT.2_0",
      target_layout_id: "LAYOUT.1_0",
      source_speakers: ["SPK.L", "SPK.R"],
      target_speakers: ["SPK.C"],
      coeffs: [[0.707, 0.707]],
    });
  });

  it("rejects an unknown matrix", () => {
    const error = captureError(() => resolver.buildMatrix(STANDARD, "DMX.NOPE"));
    expect(error).toBeInstanceOf(DownmixResolveError);
    expect(error).toMatchObject({ code: "MATRIX_UNKNOWN", message: "Matrix not found: DMX.NOPE" });
  });

  it("renders a direct matrix as CSV", () => {
    const csv = formatMatrixCsv(resolver.resolveMatrix("LAYOUT.5_1", "LAYOUT.2_0"));
    expect(csv).toBe(
      [
        "target_speaker,SPK.L,SPK.R,SPK.C,SPK.LFE,SPK.LS,SPK.RS",
        "SPK.L,1.000000,0.000000,0.707000,0.000000,0.707000,0.000000",
        "SPK.R,0.000000,1.000000,0.707000,0.000000,0.000000,0.707000",
        "",
      ].join("\n")
    );
  });

  it("composes a multi-step path", () => {
    const events: Array<[string, TelemetryData]> = [];
    setTestSink((name, data) => events.push([name, data]));

    const composed = resolver.resolveMatrix("LAYOUT.7_1_4", "LAYOUT.2_0");
    expect(composed.matrix_id).toBe("DMX.COMPOSED.LAYOUT.7_1_4_TO_LAYOUT.2_0");
    expect(composed.steps).toEqual([
      "DMX.IMM.7_1_4_TO_7_1",
      "DMX.STD.7_1_TO_5_1",
      "DMX.STD.5_1_TO_2_0.LO_RO_LFE_DROP",
    ]);
    expect(composed.target_speakers).toEqual(["SPK.L", "SPK.R"]);
    expect(composed.source_speakers).toHaveLength(12);

    // L gathers C, LS and TFL directly, LRS through LS, TRL through LRS then LS.
    const expectedL = [1, 0, 0.707, 0, 0.707, 0, 0.707 * 0.707, 0, 0.707, 0, 0.707 * 0.707 * 0.707, 0];
    const rowL = composed.coeffs[0] ?? [];
    expect(rowL).toHaveLength(12);
    expectedL.forEach((value, i) => expect(rowL[i]).toBeCloseTo(value, 9));

    expect(events).toEqual([
      [
        "downmix.matrix.resolved",
        {
          matrix_id: "DMX.COMPOSED.LAYOUT.7_1_4_TO_LAYOUT.2_0",
          source_layout_id: "LAYOUT.7_1_4",
          target_layout_id: "LAYOUT.2_0",
          policy_id: IMMERSIVE,
          steps: 3,
        },
      ],
    ]);
  });

  it("falls back to another pack for a step outside the context policy", () => {
    const composed = resolver.resolveMatrix("LAYOUT.5_1_4", "LAYOUT.2_0");
    expect(composed.steps).toEqual(["DMX.IMM.5_1_4_TO_5_1", "DMX.STD.5_1_TO_2_0.LO_RO_LFE_DROP"]);
  });

  it("requires a default policy when none is given", () => {
    const error = captureError(() => resolver.resolveMatrix("LAYOUT.1_0", "LAYOUT.2_0"));
    expect(error).toMatchObject({
      name: "DownmixResolveError",
      code: "NO_DEFAULT_POLICY",
      message: "No default policy for source layout LAYOUT.1_0",
    });
  });
});

describe("DownmixResolver over temporary registries", () => {
  let ws: Workspace;

  beforeEach(async () => {
    ws = await createWorkspace();
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  const writeComposedRegistry = async (withPath: boolean) => {
    await ws.write(
      "packs/test.yaml",
      policyPack(TEST_POLICY, {
        "DMX.TEST.5_1_TO_2_0": stereoFold(),
        "DMX.TEST.7_1_TO_5_1": rearFold(),
        "DMX.TEST.7_1_TO_2_0.COMPOSED": matrix("LAYOUT.7_1", "LAYOUT.2_0", {
          "SPK.L": { "SPK.L": 1.0 },
          "SPK.R": { "SPK.R": 1.0 },
        }),
      })
    );
    return ws.write(
      "downmix.yaml",
      registry({
        defaults: { "LAYOUT.5_1": TEST_POLICY, "LAYOUT.7_1": TEST_POLICY },
        conversions: [
          { source_layout_id: "LAYOUT.5_1", target_layout_id: "LAYOUT.2_0", matrix_id: "DMX.TEST.5_1_TO_2_0" },
          {
            source_layout_id: "LAYOUT.7_1",
            target_layout_id: "LAYOUT.2_0",
            matrix_id: "DMX.TEST.7_1_TO_2_0.COMPOSED",
          },
        ],
        composition_paths: withPath
          ? [
              {
                source_layout_id: "LAYOUT.7_1",
                target_layout_id: "LAYOUT.2_0",
                steps: [{ matrix_id: "DMX.TEST.7_1_TO_5_1" }, { matrix_id: "DMX.TEST.5_1_TO_2_0" }],
              },
            ]
          : [],
      })
    );
  };

  it("defers a .COMPOSED conversion to its composition path", async () => {
    const run = await runValidation(await writeComposedRegistry(true), testCatalog());
    expect(run.report.issues).toEqual([]);

    const composed = DownmixResolver.fromRun(run).resolveMatrix("LAYOUT.7_1", "LAYOUT.2_0");
    expect(composed.matrix_id).toBe("DMX.COMPOSED.LAYOUT.7_1_TO_LAYOUT.2_0");
    expect(composed.steps).toEqual(["DMX.TEST.7_1_TO_5_1", "DMX.TEST.5_1_TO_2_0"]);
    const expectedL = [1, 0, 0.707, 0, 0.707, 0, 0.3535, 0];
    expectedL.forEach((value, i) => expect(composed.coeffs[0]?.[i]).toBeCloseTo(value, 9));
  });

  it("uses the .COMPOSED matrix itself when no path matches", async () => {
    const run = await runValidation(await writeComposedRegistry(false), testCatalog());
    const dense = DownmixResolver.fromRun(run).resolveMatrix("LAYOUT.7_1", "LAYOUT.2_0");
    expect(dense.matrix_id).toBe("DMX.TEST.7_1_TO_2_0.COMPOSED");
    expect(dense.steps).toBeUndefined();
  });

  it("refuses a run with validation errors", async () => {
    const run = await runValidation(await ws.write("downmix.yaml", registry()), testCatalog());
    const error = captureError(() => DownmixResolver.fromRun(run));
    expect(error).toBeInstanceOf(DownmixResolveError);
    expect(error).toMatchObject({ code: "REGISTRY_INVALID" });
  });
});

describe("composeMatrices", () => {
  const mono = {
    source_layout_id: "LAYOUT.2_0",
    target_layout_id: "LAYOUT.1_0",
    source_speakers: ["SPK.L", "SPK.R"],
    target_speakers: ["SPK.C"],
    coeffs: [[0.5, 0.5]],
  };
  const upmix = {
    source_layout_id: "LAYOUT.1_0",
    target_layout_id: "LAYOUT.2_0",
    source_speakers: ["SPK.C"],
    target_speakers: ["SPK.L", "SPK.R"],
    coeffs: [[1], [1]],
  };

  it("applies the first matrix, then the second", () => {
    expect(composeMatrices(mono, upmix)).toEqual({
      source_layout_id: "LAYOUT.2_0",
      target_layout_id: "LAYOUT.2_0",
      source_speakers: ["SPK.L", "SPK.R"],
      target_speakers: ["SPK.L", "SPK.R"],
      coeffs: [
        [0.5, 0.5],
        [0.5, 0.5],
      ],
    });
  });

  it("snaps negligible products to zero", () => {
    const tiny = composeMatrices({ ...mono, coeffs: [[1e-7, 0]] }, { ...upmix, coeffs: [[1e-6], [1]] });
    expect(tiny.coeffs[0]?.[0]).toBe(0);
    expect(tiny.coeffs[1]?.[0]).toBe(1e-7);
  });

  it("rejects mismatched middle speakers", () => {
    const error = captureError(() => composeMatrices(mono, mono));
    expect(error).toMatchObject({ code: "LAYOUT_MISMATCH" });
  });
});

describe("formatMatrixCsv", () => {
  it("honours the requested precision", () => {
    const csv = formatMatrixCsv(
      {
        source_layout_id: "LAYOUT.2_0",
        target_layout_id: "LAYOUT.1_0",
        source_speakers: ["SPK.L", "SPK.R"],
        target_speakers: ["SPK.C"],
        coeffs: [[0.70711, 0.5]],
      },
      2
    );
    expect(csv).toBe("target_speaker,SPK.L,SPK.R\nSPK.C,0.71,0.50\n");
  });

  it("rejects rows that do not match the source speakers", () => {
    const error = captureError(() =>
      formatMatrixCsv({
        source_layout_id: "LAYOUT.2_0",
        target_layout_id: "LAYOUT.1_0",
        source_speakers: ["SPK.L", "SPK.R"],
        target_speakers: ["SPK.C"],
        coeffs: [[1]],
      })
    );
    expect(error).toMatchObject({ code: "MATRIX_SHAPE" });
  });
});
