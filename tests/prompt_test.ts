import { describe, expect, it } from "vitest";
import { buildPrompt, PROMPT_PREAMBLE } from "../src/prompt.ts";

describe("buildPrompt", () => {
  it("places the question after the preamble and ends with the answer cue", async () => {
    const prompt = await buildPrompt("What is Docker?");

    expect(prompt).toBe(
      `${PROMPT_PREAMBLE}\n\nStudent question: What is Docker?\n\nAnswer:`,
    );
  });

  it("adds a topic line when a topic is given", async () => {
    const prompt = await buildPrompt("What is a pod?", "Kubernetes");

    expect(prompt).toBe(
      `${PROMPT_PREAMBLE}\n\nTopic: Kubernetes\n\nStudent question: What is a pod?\n\nAnswer:`,
    );
  });

  it("treats an empty topic as no topic", async () => {
    const prompt = await buildPrompt("What is IaC?", "");

    expect(prompt).not.toContain("Topic:");
  });

  it("keeps braces and newlines in the question verbatim", async () => {
    const question = "Why does `${HOME}` print {literal}?\nSecond line";

    const prompt = await buildPrompt(question, "Shell {basics}");

    expect(prompt).toContain(`Student question: ${question}`);
    expect(prompt).toContain("Topic: Shell {basics}");
  });
});
