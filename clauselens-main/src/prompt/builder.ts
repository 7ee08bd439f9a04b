import type { Chunk } from "../retrieval/types.js";
import { estimateTextTokens } from "./token-estimator.js";
import type { AnswerPromptInput, AnswerPromptOutput, PromptSectionId, PromptSectionMetadata } from "./types.js";

/** The exact reply the model is told to give when the passages hold no answer. */
export const NOT_FOUND_REPLY = "The provided documents do not contain that information.";

export const ANSWER_INSTRUCTIONS = [
  "You answer questions about contracts using only the numbered source passages provided.",
  "Reuse the wording of the passages; do not add facts that are not in them.",
  "Answer in at most three sentences. Do not mention the passage numbers.",
  `If the passages do not answer the question, reply exactly: "${NOT_FOUND_REPLY}"`,
].join("\n");

function makeSection(id: PromptSectionId, content: string, missingReason: string): PromptSectionMetadata {
  if (content.trim().length === 0) {
    return { id, tokens: 0, included: false, reason: missingReason };
  }
  return { id, tokens: estimateTextTokens(content), included: true };
}

function renderPassage(index: number, chunk: Chunk): string {
  return `[S${index + 1}] (page ${chunk.page})\n${chunk.text.trim()}`;
}

/**
 * Places passages in ranked order until the token budget is spent.
 * The top passage is always included so the model has something to ground on.
 */
export function buildAnswerPrompt(input: AnswerPromptInput): AnswerPromptOutput {
  const sources: Chunk[] = [];
  const blocks: string[] = [];
  let spent = 0;

  for (const { chunk } of input.passages) {
    const block = renderPassage(sources.length, chunk);
    const cost = estimateTextTokens(block);
    if (sources.length > 0 && spent + cost > input.tokenBudget) break;
    sources.push(chunk);
    blocks.push(block);
    spent += cost;
  }

  const passages = blocks.join("\n\n");
  const question = input.question.trim();
  const user = [`## Source passages\n\n${passages}`, `## Question\n\n${question}`].join("\n\n");

  return {
    prompt: { system: ANSWER_INSTRUCTIONS, user },
    sources,
    sections: [
      makeSection("instructions", ANSWER_INSTRUCTIONS, "Instructions are empty"),
      makeSection("passages", passages, "No passages above the relevance floor"),
      makeSection("question", question, "Question is empty"),
    ],
  };
}
