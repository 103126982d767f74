import { describe, expect, it } from "vitest";
import { loadSystemPrompt, renderSystemPrompt } from "./system";
import { ANSWER_TEMPLATES } from "./templates";

describe("renderSystemPrompt", () => {
  it("fills the context and the answer templates", () => {
    const out = renderSystemPrompt("say {NOT_FOUND} | ctx={context}", "policy_id: POL001");
    expect(out).toBe(`say ${ANSWER_TEMPLATES.NOT_FOUND} | ctx=policy_id: POL001`);
  });

  it("leaves unknown placeholders alone", () => {
    expect(renderSystemPrompt("{unknown} {context}", "")).toBe("{unknown} ");
  });

  it("does not expand placeholders that appear inside the context", () => {
    expect(renderSystemPrompt("{context}", "{GREETING}")).toBe("{GREETING}");
  });
});

describe("loadSystemPrompt", () => {
  it("reads the bundled template with every placeholder", () => {
    const template = loadSystemPrompt();
    for (const key of ["context", ...Object.keys(ANSWER_TEMPLATES)]) {
      expect(template).toContain(`{${key}}`);
    }
  });
});
