// packages/core/src/engine/response-parser.ts — Extract repl blocks and FINAL markers

export type FinalMarker =
  | { kind: 'answer'; text: string }
  | { kind: 'variable'; name: string };

export interface ParsedResponse {
  /** Bodies of ```repl blocks, in order of appearance. Empty blocks are dropped. */
  codeBlocks: string[];
  final?: FinalMarker;
}

const CODE_BLOCK = /```repl[ \t]*\r?\n([\s\S]*?)```/g;

// The closing paren must end a line so answers may contain parentheses
const FINAL_ANSWER = /^[ \t]*FINAL\s*\(([\s\S]*?)\)[ \t]*$/m;
const FINAL_ANSWER_INLINE = /^[ \t]*FINAL\s*\((.*)\)/m;
const FINAL_VAR = /^[ \t]*FINAL_VAR\s*\(\s*['"`]?([^'"`)\s]*)['"`]?\s*\)/m;

export function extractCodeBlocks(text: string): string[] {
  const blocks: string[] = [];
  for (const match of text.matchAll(CODE_BLOCK)) {
    const body = match[1] ?? '';
    if (body.trim().length > 0) blocks.push(body.replace(/\r?\n$/, ''));
  }
  return blocks;
}

/**
 * Find a termination marker at the start of a line, outside repl blocks.
 * When both forms appear, the earlier one wins.
 */
export function extractFinal(text: string): FinalMarker | undefined {
  const prose = text.replace(CODE_BLOCK, '');

  const variable = FINAL_VAR.exec(prose);
  const answer = FINAL_ANSWER.exec(prose) ?? FINAL_ANSWER_INLINE.exec(prose);

  if (variable && (!answer || variable.index <= answer.index)) {
    return { kind: 'variable', name: variable[1] ?? '' };
  }
  if (answer) {
    return { kind: 'answer', text: (answer[1] ?? '').trim() };
  }
  return undefined;
}

export function parseResponse(text: string): ParsedResponse {
  const codeBlocks = extractCodeBlocks(text);
  const final = extractFinal(text);
  return final ? { codeBlocks, final } : { codeBlocks };
}
