import { describe, it, expect } from "vitest";

import { traceFlow } from "../src/core/services/FlowTracer.js";
import {
  renderArchitectureDiagram,
  renderCallGraph,
  renderCycleDiagram,
  renderExternalChart,
  renderFlowchart,
  renderModuleDiagram,
  renderPackageDiagram,
  sanitizeId,
  sanitizeModuleId,
} from "../src/diagrams/mermaid.js";
import { buildDiagramRelations } from "../src/diagrams/relations.js";
import { sampleSession } from "./helpers.js";

const doc = sampleSession().toDocument();

describe("node ids", () => {
  it("replaces dots, dashes and spaces", () => {
    expect(sanitizeId("Service Layer")).toBe("Service_Layer");
    expect(sanitizeId("my-pkg.mod")).toBe("my_pkg_mod");
  });

  it("collapses long module names to their first and last segment", () => {
    expect(sanitizeModuleId("app.api.views")).toBe("app___views");
    expect(sanitizeModuleId("app.views")).toBe("app_views");
  });
});

describe("buildDiagramRelations", () => {
  it("lists cycle edges with their 1-based cycle index", () => {
    expect(buildDiagramRelations(doc).cycles).toEqual([
      { source: "a", target: "b", cycleIndex: 1 },
      { source: "b", target: "c", cycleIndex: 1 },
      { source: "c", target: "a", cycleIndex: 1 },
    ]);
  });

  it("deduplicates repeated edges", () => {
    const relations = buildDiagramRelations({ ...doc, moduleDependencies: { a: ["b", "b"] } });
    expect(relations.dependencies).toEqual([{ source: "a", target: "b" }]);
  });
});

describe("dependency diagrams", () => {
  it("renders namespace dependencies", () => {
    expect(renderPackageDiagram(doc).split("\n")).toEqual([
      "graph LR",
      "    %% Package Dependencies",
      "    a --> b",
      "    b --> c",
      "    c --> a",
      "    tools --> a",
    ]);
  });

  it("renders edges of the highest fan-out modules", () => {
    expect(renderModuleDiagram(doc).split("\n")).toEqual([
      "graph TB",
      "    %% Module Dependencies (Top modules by connections)",
      "    a --> b",
      "    b --> c",
      "    c --> a",
      "    tools_x_y --> a",
    ]);
  });

  it("limits the module diagram to the requested number of modules", () => {
    expect(renderModuleDiagram(doc, 1).split("\n")).toEqual([
      "graph TB",
      "    %% Module Dependencies (Top modules by connections)",
      "    a --> b",
    ]);
  });

  it("labels cycle edges", () => {
    expect(renderCycleDiagram(doc).split("\n")).toEqual([
      "graph LR",
      "    %% Circular Dependencies",
      "    a -->|cycle 1| b",
      "    b -->|cycle 1| c",
      "    c -->|cycle 1| a",
    ]);
  });

  it("draws at most five cycles", () => {
    const circularDependencies = [1, 2, 3, 4, 5, 6].map((i) => [`m${i}`, `n${i}`, `m${i}`]);
    const lines = renderCycleDiagram({ ...doc, circularDependencies }).split("\n");

    expect(lines).toHaveLength(12);
    expect(lines[lines.length - 1]).toBe("    n5 -->|cycle 5| m5");
  });

  it("renders external usage as a pie chart", () => {
    expect(renderExternalChart(doc).split("\n")).toEqual([
      "%%{init: {'theme':'base'}}%%",
      "pie title External Package Usage",
      '    "requests": 2',
      '    "os": 1',
    ]);
  });
});

describe("renderArchitectureDiagram", () => {
  it("connects present layers in top-down order", () => {
    const diagram = renderArchitectureDiagram({
      "Controller Layer": ["controllers"],
      "Service Layer": ["services"],
      Utilities: ["utils"],
    });

    expect(diagram.split("\n")).toEqual([
      "graph TB",
      "    %% Architecture Overview",
      "",
      "    Controller_Layer[Controller Layer]",
      "    Service_Layer[Service Layer]",
      "    Utilities[Utilities]",
      "    Controller_Layer --> Service_Layer",
    ]);
  });
});

describe("call flow diagrams", () => {
  const callGraph = { ...doc.callGraph };

  it("gives every traced node its own id", () => {
    const flow = traceFlow(new Map(Object.entries(callGraph)), "login", 5);

    expect(renderFlowchart(flow).split("\n")).toEqual([
      "flowchart TD",
      '    node1["login"]',
      '    node2["verify_token"]',
      "    node1 --> node2",
      '    node3["decode"]',
      "    node2 --> node3",
      '    node4["login"]',
      "    node2 --> node4",
      '    node5["create_session"]',
      "    node1 --> node5",
    ]);
  });

  it("draws call edges of the selected functions", () => {
    expect(renderCallGraph(callGraph, ["login"]).split("\n")).toEqual([
      "graph LR",
      "    login --> verify_token",
      "    login --> create_session",
    ]);
  });

  it("picks the busiest callers when no function is selected", () => {
    expect(renderCallGraph(callGraph).split("\n")).toEqual([
      "graph LR",
      "    login --> verify_token",
      "    login --> create_session",
      "    verify_token --> decode",
      "    verify_token --> login",
      "    process_payload --> parse_json",
    ]);
  });

  it("draws a repeated call once", () => {
    expect(renderCallGraph({ run: ["step", "step", "finish"] })).toBe(
      "graph LR\n    run --> step\n    run --> finish"
    );
  });

  it("renders only the header for an unknown function", () => {
    expect(renderCallGraph(callGraph, ["missing"])).toBe("graph LR");
  });
});
