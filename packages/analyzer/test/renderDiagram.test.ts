import { describe, it, expect } from "vitest";

import { renderSessionDiagram } from "../src/tools/renderDiagram.js";
import { sampleSession } from "./helpers.js";

describe("renderSessionDiagram", () => {
  const session = sampleSession({ "API Layer": ["api"] });

  it("renders the requested kind", () => {
    const result = renderSessionDiagram(session, { kind: "circular" });
    expect(result).toEqual({
      ok: true,
      value: "graph LR\n    %% Circular Dependencies\n    a -->|cycle 1| b\n    b -->|cycle 1| c\n    c -->|cycle 1| a",
    });
  });

  it("renders the detected layers", () => {
    const result = renderSessionDiagram(session, { kind: "architecture" });
    expect(result).toEqual({
      ok: true,
      value: "graph TB\n    %% Architecture Overview\n\n    API_Layer[API Layer]",
    });
  });

  it("requires a function for flow diagrams", () => {
    const result = renderSessionDiagram(session, { kind: "flow" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("function is required for flow diagrams");
  });

  it("traces flow diagrams to the given depth", () => {
    const result = renderSessionDiagram(session, { kind: "flow", function: "login", depth: 1 });
    expect(result).toEqual({
      ok: true,
      value: [
        "flowchart TD",
        '    node1["login"]',
        '    node2["verify_token"]',
        "    node1 --> node2",
        '    node3["create_session"]',
        "    node1 --> node3",
      ].join("\n"),
    });
  });

  it("limits call graphs to one function when given", () => {
    const result = renderSessionDiagram(session, { kind: "call_graph", function: "process_payload" });
    expect(result).toEqual({ ok: true, value: "graph LR\n    process_payload --> parse_json" });
  });
});
