import { describe, it, expect } from "vitest";

import { analyzeCommand, type AnalyzeCommandOptions } from "../../src/commands/analyze.js";
import { DependencyAnalyzer } from "../../src/core/services/DependencyAnalyzer.js";
import { AnalysisWorkspace } from "../../src/workspace.js";
import { ListScanner, MemoryFileSystem, SAMPLE_FILES, TableExtractor } from "../helpers.js";

function setup(): { fs: MemoryFileSystem; workspace: AnalysisWorkspace; output: string[] } {
  const fs = new MemoryFileSystem(
    { "/proj/a.py": "", "/proj/b.py": "", "/proj/c.py": "", "/proj/tools/x-y.py": "" },
    ["/proj", "/proj/tools", "/proj/services"]
  );
  const analyzer = new DependencyAnalyzer({
    fs,
    scanner: new ListScanner(Object.keys(SAMPLE_FILES)),
    extractor: new TableExtractor(SAMPLE_FILES),
  });
  const workspace = new AnalysisWorkspace({ analyzer, fs, defaultRoot: "/proj" });
  return { fs, workspace, output: [] };
}

const ALL: AnalyzeCommandOptions = {
  output: "/out/demo",
  diagrams: "all",
  trace: "login",
  pattern: "all",
};

describe("analyzeCommand", () => {
  it("prints a summary and writes every artifact", async () => {
    const { fs, workspace, output } = setup();

    const result = await analyzeCommand("/proj", ALL, { workspace, fs, print: (line) => output.push(line) });

    expect(result.ok).toBe(true);
    expect(output).toEqual([
      "Dependency Analysis:",
      "  Files parsed: 4 of 4",
      "  Total modules: 4",
      "  Internal dependencies: 4",
      "  External packages: 2",
      "  Circular dependencies: 1",
      "  Functions: 3 (5 calls)",
      "",
      "Flow from login:",
      "login\n  verify_token\n    decode\n    login\n  create_session",
      "",
      "Authentication functions found: 2",
      "  - login",
      "  - verify_token",
      "",
      "Data processing functions found: 1",
      "  - process_payload",
      "",
      "Full analysis: /out/demo_analysis.json",
      "Package diagram: /out/demo_packages.mmd",
      "Module diagram: /out/demo_modules.mmd",
      "Circular dependencies: /out/demo_circular.mmd",
      "Architecture diagram: /out/demo_architecture.mmd",
      "Flow trace diagram: /out/demo_trace_login.mmd",
      "Flow tree data: /out/demo_trace_login.json",
      "Authentication flow diagram: /out/demo_auth_flow.mmd",
      "Data processing flow diagram: /out/demo_data_flow.mmd",
      "",
      "Top External Packages:",
      "  requests: 2 uses",
      "  os: 1 uses",
      "",
      "Warning: 1 circular dependencies detected!",
    ]);

    expect(fs.files.get("/out/demo_auth_flow.mmd")).toBe(
      [
        "graph LR",
        "    login --> verify_token",
        "    login --> create_session",
        "    verify_token --> decode",
        "    verify_token --> login",
      ].join("\n")
    );
    expect(fs.files.get("/out/demo_architecture.mmd")).toBe(
      "graph TB\n    %% Architecture Overview\n\n    Service_Layer[Service Layer]"
    );
  });

  it("writes the analysis document as JSON", async () => {
    const { fs, workspace } = setup();

    await analyzeCommand("/proj", ALL, { workspace, fs, print: () => undefined });

    const analysis: unknown = JSON.parse(fs.files.get("/out/demo_analysis.json") ?? "null");
    expect(analysis).toMatchObject({
      root: "/proj",
      circularDependencies: [["a", "b", "c", "a"]],
      externalDependencies: { requests: 2, os: 1 },
    });

    const trace: unknown = JSON.parse(fs.files.get("/out/demo_trace_login.json") ?? "null");
    expect(trace).toMatchObject({ start: "login", maxDepth: 5 });
  });

  it("writes only the selected diagram and pattern", async () => {
    const { fs, workspace } = setup();

    await analyzeCommand(
      "/proj",
      { output: "/out/x", diagrams: "package", pattern: "data", depth: 2 },
      { workspace, fs, print: () => undefined }
    );

    const written = [...fs.files.keys()].filter((file) => file.startsWith("/out/"));
    expect(written).toEqual(["/out/x_analysis.json", "/out/x_packages.mmd", "/out/x_data_flow.mmd"]);
  });

  it("returns the analysis error without writing anything", async () => {
    const { fs, workspace, output } = setup();

    const result = await analyzeCommand("/missing", ALL, { workspace, fs, print: (line) => output.push(line) });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Analysis root does not exist: /missing");
    expect(output).toEqual([]);
    expect([...fs.files.keys()].some((file) => file.startsWith("/out/"))).toBe(false);
  });
});
