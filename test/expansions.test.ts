import { describe, expect, it } from "vitest";

import {
  expandShortDescription,
  expandShortDescriptions,
  isShortDescription,
  loadDescriptionExpansions,
  parseDescriptionExpansions,
} from "@/lib/extraction/expansions";
import { ExtractionError } from "@/types/pricelist";
import { rawRecord } from "./fixtures";

describe("isShortDescription", () => {
  it("flags descriptions under ten characters and lone words under twenty", () => {
    expect(isShortDescription("Crane")).toBe(true);
    expect(isShortDescription("Excavation")).toBe(true);
    expect(isShortDescription("Reinforcement")).toBe(true);
    expect(isShortDescription("Supply pump")).toBe(false);
    expect(isShortDescription("Excavate trench")).toBe(false);
  });
});

describe("expandShortDescription", () => {
  it("looks terms up directly, then by their singular form", () => {
    expect(expandShortDescription("Crane", "Groundworks", "item")).toBe("Mobile crane hire including operator");
    expect(expandShortDescription(" Hoists ", "Groundworks", "item")).toBe("Material hoist hire and operation");
  });

  it("falls back to the first term contained in the description", () => {
    expect(expandShortDescription("Mini crane", "Groundworks", "nr")).toBe("Mobile crane hire including operator");
  });

  it("matches single-character terms exactly only", () => {
    expect(expandShortDescription("-", "Drainage", "nr")).toBe("As per drawings/specification");
    expect(expandShortDescription("Sub-base", "Groundworks", "m")).toBe("Sub-base measured works");
  });

  it("suffixes unknown short descriptions from the category and unit", () => {
    expect(expandShortDescription("Gully", "Groundworks", "day")).toBe("Gully labour (daily rate)");
    expect(expandShortDescription("Gully", "RC Works", "nr")).toBe("Gully concrete works");
    expect(expandShortDescription("Gully", "External Works", "nr")).toBe("Gully external works");
    expect(expandShortDescription("Gully", "Groundworks", "m")).toBe("Gully measured works");
    expect(expandShortDescription("Gully", "Drainage", "nr")).toBe("Gully as per specification");
  });

  it("keeps unknown descriptions of ten characters or more", () => {
    expect(expandShortDescription("Geocomposite", "Drainage", "m²")).toBe("Geocomposite");
  });

  it("replaces blank descriptions", () => {
    expect(expandShortDescription("  ", "Drainage", "nr")).toBe("Item as per specification");
  });
});

describe("expandShortDescriptions", () => {
  it("rewrites only short descriptions the dictionary changes", () => {
    const crane = rawRecord({ description: "Crane", unit: "day" });
    const trench = rawRecord();
    const geocomposite = rawRecord({ description: "Geocomposite", unit: "m²" });

    const [expanded, unchanged, kept] = expandShortDescriptions([crane, trench, geocomposite]);

    expect(expanded).toEqual({ ...crane, description: "Mobile crane hire including operator" });
    expect(Object.isFrozen(expanded)).toBe(true);
    expect(unchanged).toBe(trench);
    expect(kept).toBe(geocomposite);
  });

  it("accepts a custom table", () => {
    const expansions = parseDescriptionExpansions({
      entries: [{ term: "kerb", expansion: "Precast concrete kerb laid on bed" }],
      fallbackSuffix: "works",
      emptyDescription: "Unspecified item",
    });

    const [kerb, gully] = expandShortDescriptions(
      [rawRecord({ description: "Kerbs" }), rawRecord({ description: "Gully" })],
      expansions
    );

    expect(expansions.contextRules).toEqual([]);
    expect(kerb?.description).toBe("Precast concrete kerb laid on bed");
    expect(gully?.description).toBe("Gully works");
  });
});

describe("description expansion tables", () => {
  it("loads the bundled table in file order", () => {
    const { entries, contextRules } = loadDescriptionExpansions();

    expect(entries[0]).toEqual({ term: "bollard", expansion: "Supply and install concrete/steel bollard" });
    expect(entries.at(-1)).toEqual({ term: "-", expansion: "As per drawings/specification" });
    expect(contextRules.map((rule) => rule.suffix)).toEqual([
      "labour (daily rate)",
      "concrete works",
      "steel works",
      "external works",
      "measured works",
    ]);
  });

  it("rejects malformed tables", () => {
    expect(() => parseDescriptionExpansions({ entries: [{ term: "", expansion: "x" }] })).toThrow(ExtractionError);

    try {
      parseDescriptionExpansions({ entries: [] });
      expect.unreachable();
    } catch (error) {
      expect(error instanceof ExtractionError ? error.code : null).toBe("INVALID_EXPANSIONS");
    }
  });
});
