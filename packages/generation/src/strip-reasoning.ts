const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;

/** Remove `<think>` reasoning blocks that reasoning models prepend to answers. */
export function stripReasoning(text: string): string {
  return text.replace(THINK_BLOCK, "").trim();
}
