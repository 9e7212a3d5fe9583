import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdirSync, writeFileSync, rmSync } from "fs";
import { join, dirname } from "path";
import { tmpdir } from "os";

import {
  AnalysisWorkspace,
  DependencyAnalyzer,
  NodeFileSystem,
  NodeProjectScanner,
  TreeSitterExtractor,
} from "../src/index.js";

const PROJECT: Record<string, string> = {
  "a.py": `import requests
import b


def login(user):
    token = verify_token(user)
    return create_session(token)
`,
  "b.py": `import requests
import c


def verify_token(user):
    return decode(user)
`,
  "c.py": `import a


def decode(value):
    return value
`,
  "broken.py": "def broken(:\n    pass\n",
  "services/__init__.py": "",
  "node_modules/left_pad.py": "import a\n",
  "structmap.config.json": JSON.stringify({ keywords: { dataProcessing: ["decode"] } }),
};

describe("analysis of a Python tree", () => {
  let testDir: string;
  let workspace: AnalysisWorkspace;

  beforeAll(() => {
    testDir = join(tmpdir(), `structmap-analysis-test-${Date.now()}`);
    for (const [file, content] of Object.entries(PROJECT)) {
      const fullPath = join(testDir, file);
      mkdirSync(dirname(fullPath), { recursive: true });
      writeFileSync(fullPath, content);
    }

    const fs = new NodeFileSystem();
    workspace = new AnalysisWorkspace({
      analyzer: new DependencyAnalyzer({
        fs,
        scanner: new NodeProjectScanner(),
        extractor: new TreeSitterExtractor(),
      }),
      fs,
      defaultRoot: testDir,
    });
  });

  afterAll(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("builds the module graph and finds the import cycle", async () => {
    const result = await workspace.analyze();
    if (!result.ok) throw result.error;
    const doc = result.value.toDocument();

    expect(doc.moduleDependencies).toEqual({ a: ["b"], b: ["c"], c: ["a"], services: [] });
    expect(doc.externalDependencies).toEqual({ requests: 2 });
    expect(doc.circularDependencies).toEqual([["a", "b", "c", "a"]]);
    expect(doc.layers).toEqual({ "Service Layer": ["services"] });
  });

  it("reports the unparseable file and counts the rest", async () => {
    const result = await workspace.analyze();
    if (!result.ok) throw result.error;
    const doc = result.value.toDocument();

    expect(doc.summary.filesScanned).toBe(5);
    expect(doc.summary.filesParsed).toBe(4);
    expect(doc.failures.map((f) => f.file)).toEqual(["broken.py"]);
  });

  it("traces calls across modules and applies configured keywords", async () => {
    const result = await workspace.analyze();
    if (!result.ok) throw result.error;

    expect(result.value.trace("login").flow).toEqual({
      function: "login",
      calls: [
        { function: "verify_token", calls: [{ function: "decode", calls: [] }] },
        { function: "create_session", calls: [] },
      ],
    });
    expect(result.value.patterns).toEqual({
      authenticationFunctions: ["login", "verify_token"],
      dataProcessingFunctions: ["decode"],
    });
  });
});
