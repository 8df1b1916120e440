import { describe, it, expect, vi, afterEach } from "vitest";
import { exportDocument, buildSections, formatPrefixChoices } from "../src/exporter.js";
import { PrefixCollisionError } from "../src/types.js";
import type { Warning } from "../src/types.js";
import { loadFixture, makeModel } from "./helpers.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("exporter", () => {
  describe("two-router scenario", () => {
    const model = loadFixture("two-router.json");

    it("builds every section", () => {
      expect(buildSections(model)).toEqual({
        PREFIXES: "prefix10_0_0_0_8",
        INTERNAL_NODES: "  \\node[router] at (0, 0) (r0) {}; % A",
        EXTERNAL_NODES: "  \\node[external] at (1, 1) (r1) {}; % ",
        EDGES: "  \\draw[link] (r0) -- (r1);",
        NEXT_HOPS: "    \\ifdefined\\prefix10_0_0_0_8\n\n  \\fi",
        LINK_WEIGHTS: [
          "    \\draw ($(r0)!\\linkweightdist!(r1)$) node[link weight] { 100 };",
          "    \\draw ($(r1)!\\linkweightdist!(r0)$) node[link weight] { 100 };",
        ].join("\n"),
        BGP_SESSIONS: "",
        BGP_PROPAGATIONS: "    \\ifdefined\\prefix10_0_0_0_8\n\n  \\fi",
      });
    });

    it("renders the picture body into the skeleton", () => {
      const document = exportDocument(model);
      expect(document.startsWith("\n% This file was automatically generated by tikz-netexport\n")).toBe(true);
      expect(document.endsWith("\\end{tikzpicture}\n\\end{document}\n")).toBe(true);
      expect(document).toContain("\\def\\prefix1{1} % choices: prefix10_0_0_0_8\n");
      expect(document).toContain(
        [
          "\\begin{tikzpicture}[xscale=\\width, yscale=\\height]",
          "  \\node[router] at (0, 0) (r0) {}; % A",
          "  \\node[external] at (1, 1) (r1) {}; % ",
          "",
          "  \\draw[link] (r0) -- (r1);",
          "",
          "  \\ifdefined\\showNextHop",
          "    \\ifdefined\\prefix10_0_0_0_8",
          "",
          "  \\fi",
          "  \\fi",
          "",
        ].join("\n"),
      );
    });
  });

  it("uses one identifier for the toggle list and both conditional sections", () => {
    const model = loadFixture("triangle.json");
    const sections = buildSections(model);
    expect(sections.PREFIXES).toBe("prefix10_0_0_0_8, prefix192_168_1_0_24");
    for (const toggle of sections.PREFIXES.split(", ")) {
      const guard = `\\ifdefined\\${toggle}\n`;
      expect(sections.NEXT_HOPS.split(guard)).toHaveLength(2);
      expect(sections.BGP_PROPAGATIONS.split(guard)).toHaveLength(2);
    }
  });

  it("emits exactly one link line per distinct undirected connection", () => {
    const model = loadFixture("triangle.json");
    expect(buildSections(model).EDGES.split("\n")).toHaveLength(4);
  });

  it("is deterministic", () => {
    const model = loadFixture("triangle.json");
    expect(exportDocument(model)).toBe(exportDocument(model));
  });

  it("reads the prefix list once per export", () => {
    let listed = 0;
    let converted = 0;
    const model = makeModel({
      internalRouters: () => [0],
      knownPrefixes: () => {
        listed += 1;
        return ["10.0.0.0/8", "10.1.0.0/16"];
      },
      prefixString: (prefix) => {
        converted += 1;
        return prefix;
      },
    });

    const sections = buildSections(model);
    expect(listed).toBe(1);
    expect(converted).toBe(2);
    expect(sections.PREFIXES).toBe("prefix10_0_0_0_8, prefix10_1_0_0_16");
    expect(sections.NEXT_HOPS).toBe(
      "    \\ifdefined\\prefix10_0_0_0_8\n\n  \\fi\n    \\ifdefined\\prefix10_1_0_0_16\n\n  \\fi",
    );
  });

  it("propagates the first failing model query", () => {
    const model = makeModel({
      knownPrefixes: () => ["10.0.0.0/8"],
      propagations: () => {
        throw new Error("route table unavailable");
      },
    });
    expect(() => exportDocument(model)).toThrow("route table unavailable");
  });

  describe("formatPrefixChoices", () => {
    it("is empty without prefixes", () => {
      expect(formatPrefixChoices(makeModel())).toBe("");
    });

    it("follows model order", () => {
      const model = makeModel({ knownPrefixes: () => ["b.0/1", "a.0/1"] });
      expect(formatPrefixChoices(model)).toBe("prefixb_0_1, prefixa_0_1");
    });
  });

  describe("prefix collisions", () => {
    const model = makeModel({ knownPrefixes: () => ["10.0.0.0/8", "10_0_0_0/8"] });

    it("warns and still renders by default", () => {
      const warnings: Warning[] = [];
      const sections = buildSections(model, {}, warnings);
      expect(sections.PREFIXES).toBe("prefix10_0_0_0_8, prefix10_0_0_0_8");
      expect(warnings).toEqual([
        {
          level: "warn",
          module: "exporter",
          message: "Prefixes 10.0.0.0/8, 10_0_0_0/8 share the toggle prefix10_0_0_0_8",
        },
      ]);
    });

    it("throws under the error policy", () => {
      expect(() => exportDocument(model, { prefixCollisions: "error" })).toThrow(PrefixCollisionError);
      expect(() => exportDocument(model, { prefixCollisions: "error" })).toThrow(
        "Prefixes share a toggle identifier: 10.0.0.0/8, 10_0_0_0/8 → prefix10_0_0_0_8",
      );
    });
  });

  describe("verbose logging", () => {
    it("writes section counts to stderr only when verbose", () => {
      const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      const model = loadFixture("two-router.json");

      exportDocument(model);
      expect(write).not.toHaveBeenCalled();

      exportDocument(model, { verbose: true });
      expect(write).toHaveBeenCalledWith("[INFO] Known prefixes: 1\n");
      expect(write).toHaveBeenCalledWith("[INFO]   LINK_WEIGHTS: 2 line(s)\n");
      expect(write).toHaveBeenCalledWith("[INFO]   BGP_SESSIONS: 0 line(s)\n");
    });
  });
});
