// packages/core/src/types/sandbox.ts

export type NamespaceKind =
  | 'text'
  | 'number'
  | 'boolean'
  | 'null'
  | 'sequence'
  | 'mapping'
  | 'function'
  | 'opaque';

/** Host-side view of one binding in the sandbox namespace. */
export interface NamespaceValue {
  name: string;
  kind: NamespaceKind;
  /** Length for text, element count for sequences, key count for mappings. */
  size?: number;
  /** String rendering, capped at VARIABLE_PREVIEW_CHARS for listings. */
  preview: string;
}

export interface ExecutionResult {
  output: string;
  error?: string;
  durationMs: number;
  /** Provider fault raised by llm_query during this execution. */
  fault?: Error;
}
