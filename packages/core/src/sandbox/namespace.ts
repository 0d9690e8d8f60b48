// packages/core/src/sandbox/namespace.ts — Host-side decoding of namespace inspections

import { z } from 'zod';
import type { NamespaceValue } from '../types/sandbox.js';
import { SandboxError } from '../utils/errors.js';

const namespaceValueSchema = z.object({
  name: z.string(),
  kind: z.enum(['text', 'number', 'boolean', 'null', 'sequence', 'mapping', 'function', 'opaque']),
  size: z.number().int().nonnegative().optional(),
  preview: z.string(),
});

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

// Words that cannot stand as a binding reference in sloppy-mode code
const RESERVED_WORDS = new Set([
  'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default', 'delete', 'do',
  'else', 'enum', 'export', 'extends', 'false', 'finally', 'for', 'function', 'if', 'import',
  'in', 'instanceof', 'new', 'null', 'return', 'super', 'switch', 'this', 'throw', 'true',
  'try', 'typeof', 'var', 'void', 'while', 'with',
]);

/** Names the host is willing to splice into inspection code. */
export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && !RESERVED_WORDS.has(name);
}

function decode<T>(raw: unknown, schema: z.ZodType<T>, what: string): T {
  if (typeof raw !== 'string') {
    throw new SandboxError(`Malformed ${what} from isolate: expected a JSON string`);
  }
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new SandboxError(`Malformed ${what} from isolate: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function decodeNamespaceValue(raw: unknown): NamespaceValue {
  return decode(raw, namespaceValueSchema, 'binding description');
}

export function decodeNamespaceListing(raw: unknown): NamespaceValue[] {
  return decode(raw, z.array(namespaceValueSchema), 'namespace listing');
}
