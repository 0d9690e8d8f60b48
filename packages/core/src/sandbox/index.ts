// packages/core/src/sandbox -- isolated-vm execution environment

export { IsolateSandbox, CONTEXT_BINDING } from './sandbox.js';
export type { Sandbox, SandboxOptions } from './sandbox.js';
export { isIdentifier } from './namespace.js';
