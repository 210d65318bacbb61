import { PromptTemplate } from "@langchain/core/prompts";

/**
 * Prompt construction for the study assistant.
 *
 * Layout (sections separated by a blank line):
 *   preamble
 *   Topic: <topic>            (only when a topic is given)
 *   Student question: <question>
 *   Answer:
 *
 * Question and topic are inserted verbatim; template variables are substituted once and never
 * re-parsed, so braces in user text are safe.
 */
export const PROMPT_PREAMBLE = `You are an educational assistant specialized in Cloud Computing, DevOps and AWS.
Answer in a clear, didactic and practical way.

GUIDELINES:
1. Explain technical concepts in accessible language
2. Use practical examples whenever possible
3. If the question is very broad, focus on the main points
4. Include good practices when relevant
5. Use markdown formatting for readability`;

const questionPrompt = PromptTemplate.fromTemplate<{ topicSection: string; question: string }>(
  `${PROMPT_PREAMBLE}{topicSection}\n\nStudent question: {question}\n\nAnswer:`,
);

export async function buildPrompt(question: string, topic?: string): Promise<string> {
  const topicSection = topic ? `\n\nTopic: ${topic}` : "";
  return await questionPrompt.format({ topicSection, question });
}
