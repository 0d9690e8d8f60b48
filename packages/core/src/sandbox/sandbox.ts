// packages/core/src/sandbox/sandbox.ts — Per-session V8 isolate with a persistent namespace

import ivm from 'isolated-vm';
import type { Context, Isolate } from 'isolated-vm';
import type { ContextInput } from '../types/session.js';
import type { ExecutionResult, NamespaceValue } from '../types/sandbox.js';
import {
  DEFAULT_EXECUTION_TIMEOUT_MS,
  DEFAULT_SANDBOX_MEMORY_MB,
  VARIABLE_PREVIEW_CHARS,
} from '../utils/constants.js';
import { SandboxError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { BOOTSTRAP_SOURCE } from './bootstrap.js';
import { decodeNamespaceListing, decodeNamespaceValue, isIdentifier } from './namespace.js';

/** Reserved binding holding the session's context. */
export const CONTEXT_BINDING = 'context';

const INSPECTION_TIMEOUT_MS = 5000;

export interface Sandbox {
  execute(code: string): Promise<ExecutionResult>;
  /** Resolve a binding, global or top-level lexical. Undefined when unbound. */
  getVariable(name: string): Promise<NamespaceValue | undefined>;
  /** Bindings on the global object beyond the built-ins and intrinsics. */
  listVariables(): Promise<NamespaceValue[]>;
  dispose(): void;
}

export interface SandboxOptions {
  context: ContextInput;
  /** Recursion depth of code run in this sandbox. The root loop is 0. */
  depth: number;
  maxRecursionDepth: number;
  /** Host side of llm_query. Omitted, or depth + 1 over the limit, withholds the intrinsic. */
  onQuery?: (prompt: string) => Promise<string>;
  timeoutMs?: number;
  memoryLimitMb?: number;
  logger?: Logger;
}

interface IsolateHandles {
  isolate: Isolate;
  context: Context;
  refs: Array<{ release(): void }>;
}

/**
 * JavaScript sandbox bound to one session. Each instance owns a dedicated
 * isolate; code sees `context`, `print`, `console` and `llm_query` and
 * nothing of the host.
 */
export class IsolateSandbox implements Sandbox {
  private handles: IsolateHandles | undefined;
  private lines: string[] = [];
  private fault: Error | undefined;
  private readonly timeoutMs: number;
  private readonly memoryLimitMb: number;
  private readonly logger: Logger;

  private constructor(private readonly options: SandboxOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
    this.memoryLimitMb = options.memoryLimitMb ?? DEFAULT_SANDBOX_MEMORY_MB;
    this.logger = options.logger ?? createLogger('silent');
  }

  static async create(options: SandboxOptions): Promise<IsolateSandbox> {
    const sandbox = new IsolateSandbox(options);
    await sandbox.boot();
    return sandbox;
  }

  get subCallsAllowed(): boolean {
    return this.options.onQuery !== undefined && this.options.depth + 1 <= this.options.maxRecursionDepth;
  }

  async execute(code: string): Promise<ExecutionResult> {
    const { isolate, context } = this.requireHandles();
    this.lines = [];
    this.fault = undefined;
    const start = Date.now();
    let error: string | undefined;

    try {
      const script = await isolate.compileScript(code, { filename: 'repl.js' });
      try {
        const completion = await script.run(context, { timeout: this.timeoutMs, reference: true });
        completion.release();
      } finally {
        script.release();
      }
    } catch (err) {
      error = describeError(err);
    }

    if (isolate.isDisposed) {
      // isolated-vm tears the isolate down when the heap limit is hit
      this.logger.warn(`Isolate disposed during execution (memory limit ${this.memoryLimitMb} MB); rebuilding`);
      this.dispose();
      await this.boot();
      error = `${error ?? 'Isolate was disposed'}\nThe namespace was reset: only ${CONTEXT_BINDING} is bound.`;
    }

    return {
      output: this.lines.map((line) => `${line}\n`).join(''),
      error,
      durationMs: Date.now() - start,
      fault: this.fault,
    };
  }

  async getVariable(name: string): Promise<NamespaceValue | undefined> {
    if (!isIdentifier(name)) return undefined;
    const { context } = this.requireHandles();
    let raw: unknown;
    try {
      raw = await context.evalClosure(
        `try { return typeof ${name} === 'undefined' ? null : __describe(${JSON.stringify(name)}, ${name}, 0); } catch (err) { return null; }`,
        [],
        { result: { copy: true }, timeout: INSPECTION_TIMEOUT_MS },
      );
    } catch (err) {
      // A name the parser rejects cannot be bound
      if (err instanceof Error && err.name === 'SyntaxError') return undefined;
      throw err;
    }
    return raw === null ? undefined : decodeNamespaceValue(raw);
  }

  async listVariables(): Promise<NamespaceValue[]> {
    const { context } = this.requireHandles();
    const raw: unknown = await context.evalClosure(
      'return __listGlobals($0);',
      [VARIABLE_PREVIEW_CHARS],
      { result: { copy: true }, timeout: INSPECTION_TIMEOUT_MS },
    );
    return decodeNamespaceListing(raw);
  }

  dispose(): void {
    const handles = this.handles;
    this.handles = undefined;
    if (!handles) return;
    for (const ref of handles.refs) ref.release();
    handles.context.release();
    if (!handles.isolate.isDisposed) handles.isolate.dispose();
  }

  private requireHandles(): IsolateHandles {
    if (!this.handles) {
      throw new SandboxError('Sandbox has been disposed');
    }
    return this.handles;
  }

  private async boot(): Promise<void> {
    let isolate: Isolate;
    try {
      isolate = new ivm.Isolate({ memoryLimit: this.memoryLimitMb });
    } catch (err) {
      throw new SandboxError(`Failed to create isolate: ${describeError(err)}`);
    }

    try {
      const context = await isolate.createContext();
      const emitRef = new ivm.Reference((line: string) => {
        this.lines.push(line);
      });
      const onQuery = this.options.onQuery;
      const queryRef =
        onQuery && this.subCallsAllowed
          ? new ivm.Reference((prompt: string) => this.hostQuery(onQuery, prompt))
          : null;

      await context.evalClosure(BOOTSTRAP_SOURCE, [emitRef, queryRef, this.options.depth, this.options.maxRecursionDepth], {
        timeout: INSPECTION_TIMEOUT_MS,
      });
      await context.global.set(CONTEXT_BINDING, this.options.context, { copy: true });

      this.handles = { isolate, context, refs: queryRef ? [emitRef, queryRef] : [emitRef] };
    } catch (err) {
      if (!isolate.isDisposed) isolate.dispose();
      throw new SandboxError(`Failed to initialise sandbox: ${describeError(err)}`);
    }
  }

  /**
   * Host side of llm_query. Never rejects: the isolate receives a JSON reply
   * and raises inside the code on failure. Failures are kept as the
   * execution's fault.
   */
  private async hostQuery(onQuery: (prompt: string) => Promise<string>, prompt: string): Promise<string> {
    try {
      const text = await onQuery(prompt);
      return JSON.stringify({ ok: true, text });
    } catch (err) {
      const fault = err instanceof Error ? err : new Error(String(err));
      this.fault ??= fault;
      this.logger.warn(`llm_query failed: ${fault.message}`);
      return JSON.stringify({ ok: false, message: fault.message });
    }
  }
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name || 'Error'}: ${err.message}`;
  }
  return `Uncaught ${String(err)}`;
}
