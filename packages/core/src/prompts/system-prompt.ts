// packages/core/src/prompts/system-prompt.ts

import type { ModelVariant } from '../types/config.js';
import type { ChatMessage } from '../types/models.js';
import type { ContextInput } from '../types/session.js';
import { PROMPT_CHUNK_LENGTHS_SHOWN } from '../utils/constants.js';

/**
 * Shape of the context as reported to the root model. The text itself is never sent.
 */
export interface ContextShape {
  contextType: 'string' | 'list';
  totalLength: number;
  chunkLengths: number[];
}

export interface SystemPromptOptions extends ContextShape {
  modelVariant: ModelVariant;
  /** False selects the dialect without llm_query. */
  allowSubCalls: boolean;
}

export function describeContext(context: ContextInput): ContextShape {
  if (typeof context === 'string') {
    return { contextType: 'string', totalLength: context.length, chunkLengths: [context.length] };
  }
  const chunkLengths = context.map((chunk) => chunk.length);
  return {
    contextType: 'list',
    totalLength: chunkLengths.reduce((sum, n) => sum + n, 0),
    chunkLengths,
  };
}

function formatChunkLengths(lengths: number[]): string {
  const shown = lengths.slice(0, PROMPT_CHUNK_LENGTHS_SHOWN).join(', ');
  const rest = lengths.length - PROMPT_CHUNK_LENGTHS_SHOWN;
  return rest > 0 ? `[${shown}, ... ${rest} more]` : `[${shown}]`;
}

function contextLine(shape: ContextShape): string {
  const kind = shape.contextType === 'string' ? 'string' : 'list of strings';
  return `Your context is a ${kind} with ${shape.totalLength} total characters, broken into chunks of these character lengths: ${formatChunkLengths(shape.chunkLengths)}.`;
}

const BATCHING_WARNING = [
  'IMPORTANT: every llm_query call is slow and billed. Batch as much text as is reasonable into each call',
  '(on the order of 200k characters). With 1000 lines to process, send chunks of many lines per call',
  'rather than one call per line. Keep the number of llm_query calls as small as the task allows.',
].join('\n');

const FINAL_RULES = [
  'When you are finished, give your final answer OUTSIDE of any code block, on its own line, in one of two forms:',
  '1. FINAL(your final answer here) to answer directly',
  '2. FINAL_VAR(variable_name) to answer with the value of a variable you created in the REPL',
  'Do not write FINAL or FINAL_VAR until the task is complete. A response that contains a ```repl block is',
  'executed first, and any FINAL in that same response is ignored.',
].join('\n');

const NAMESPACE_RULES = [
  'Variables persist between code blocks. Top-level `const` and `let` names cannot be declared twice in one',
  'session, so use `var` or plain assignment for values you will update in later blocks.',
  'There is no `require`, `import`, filesystem, network or timer access; `await` is not available at top level.',
].join('\n');

function withSubCalls(shape: ContextShape, variant: ModelVariant): string {
  return [
    'You are answering a query about a context that you can only reach through a JavaScript REPL. That REPL can',
    'also query sub-LLMs, and you are strongly encouraged to use them. You will be prompted repeatedly until you',
    'give a final answer.',
    '',
    contextLine(shape),
    '',
    ...(variant === 'qwen' ? [BATCHING_WARNING, ''] : []),
    'The REPL provides:',
    '1. A `context` variable holding the information your query is about. Inspect it before answering and read',
    '   through as much of it as the query needs.',
    '2. A synchronous `llm_query(prompt)` function that sends a prompt to a sub-LLM (which can take around 500K',
    '   characters) and returns its answer as a string.',
    '3. `print(...)` (and `console.log`) to see values. Their output is returned to you after each block.',
    '',
    'Printed output may be truncated when it is very long, so pass large text to llm_query instead of printing it.',
    'Use variables as buffers while you build up the answer.',
    '',
    'A good strategy: look at the context, decide how to chunk it, ask llm_query a focused question per chunk,',
    'collect the answers in an array, then ask llm_query once more to combine them.',
    '',
    'To run code, wrap it in a fenced block tagged `repl`:',
    '',
    '```repl',
    'var chunk = context.slice(0, 10000);',
    "var answer = llm_query(`What is the magic number in this text? ${chunk}`);",
    'print(answer);',
    '```',
    '',
    'Iterating over a list context:',
    '',
    '```repl',
    'var notes = [];',
    'for (let i = 0; i < context.length; i++) {',
    "  notes.push(llm_query(`Section ${i + 1} of ${context.length}. Collect facts relevant to the query.\\n${context[i]}`));",
    '}',
    "var summary = llm_query(`Combine these notes into one answer:\\n${notes.join('\\n')}`);",
    'print(summary);',
    '```',
    '',
    NAMESPACE_RULES,
    '',
    FINAL_RULES,
    '',
    'Think step by step, then act on your plan in the same response instead of describing what you will do.',
    'Remember to answer the original query explicitly in your final answer.',
  ].join('\n');
}

function withoutSubCalls(shape: ContextShape): string {
  return [
    'You are answering a query about a context that you can only reach through a JavaScript REPL. Use the REPL as',
    'much as you need. You will be prompted repeatedly until you give a final answer.',
    '',
    contextLine(shape),
    '',
    'The REPL provides:',
    '1. A `context` variable holding the information your query is about. Inspect it before answering.',
    '2. `print(...)` (and `console.log`) to see values. Their output is returned to you after each block.',
    '',
    'Printed output may be truncated when it is very long. Use variables as buffers while you build up the answer.',
    '',
    'To run code, wrap it in a fenced block tagged `repl`:',
    '',
    '```repl',
    'var head = context.slice(0, 10000);',
    'print(head);',
    '```',
    '',
    NAMESPACE_RULES,
    '',
    FINAL_RULES,
    '',
    'Think step by step and act on your plan immediately.',
  ].join('\n');
}

export function buildSystemPrompt(options: SystemPromptOptions): string {
  return options.allowSubCalls ? withSubCalls(options, options.modelVariant) : withoutSubCalls(options);
}

/** Opening history for a session: system prompt plus the query turn. */
export function initialMessages(query: string, options: SystemPromptOptions): ChatMessage[] {
  return [
    { role: 'system', content: buildSystemPrompt(options) },
    { role: 'user', content: `Query: ${query}` },
  ];
}

export const CONTINUE_PROMPT =
  'Continue working in the REPL with a ```repl block, or give your final answer with FINAL(...) or FINAL_VAR(...).';

/** User turn that reports an execution back to the root model. */
export function executionFeedback(output: string, error?: string): string {
  const parts = ['REPL output:'];
  parts.push(output.length > 0 ? output.replace(/\n$/, '') : '(no output)');
  if (error) parts.push(`Error: ${error}`);
  return parts.join('\n');
}
