// ~4 chars per token for English prose; enough to keep a prompt under budget
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
