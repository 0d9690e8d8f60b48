// packages/core/src/sandbox/bootstrap.ts — Code run once inside each fresh isolate

/**
 * Closure body evaluated with `context.evalClosure`. Arguments:
 *   $0  Reference to the host output sink, called with one rendered line
 *   $1  Reference to the host query function, or null when sub-calls are withheld
 *   $2  recursion depth of the code running in this isolate
 *   $3  configured recursion limit
 *
 * Installs `print`, `console` and `llm_query` as writable non-enumerable
 * globals, plus the hidden `__describe` / `__listGlobals` helpers the host
 * uses to inspect the namespace. Everything on the global object at the end
 * of this script is baseline and never reported as a binding.
 */
export const BOOTSTRAP_SOURCE = String.raw`
const emit = $0;
const query = $1;
const depth = $2;
const limit = $3;

const define = (name, value, writable) =>
  Object.defineProperty(globalThis, name, { value, writable, configurable: writable, enumerable: false });

function toPlain(value) {
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return [...value];
  return value;
}

function render(value) {
  if (typeof value === 'string') return value;
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol' || typeof value === 'bigint') {
    return String(value);
  }
  try {
    const json = JSON.stringify(toPlain(value));
    return json === undefined ? String(value) : json;
  } catch (err) {
    return String(value);
  }
}

function describe(name, value, cap) {
  let kind = 'opaque';
  let size;
  let preview;
  if (value === null || value === undefined) {
    kind = 'null';
    preview = String(value);
  } else if (typeof value === 'string') {
    kind = 'text';
    size = value.length;
    preview = value;
  } else if (typeof value === 'number' || typeof value === 'bigint') {
    kind = 'number';
    preview = String(value);
  } else if (typeof value === 'boolean') {
    kind = 'boolean';
    preview = String(value);
  } else if (typeof value === 'function') {
    kind = 'function';
    preview = '[function ' + (value.name || 'anonymous') + ']';
  } else if (Array.isArray(value) || value instanceof Set) {
    kind = 'sequence';
    size = Array.isArray(value) ? value.length : value.size;
    preview = render(value);
  } else if (value instanceof Map) {
    kind = 'mapping';
    size = value.size;
    preview = render(value);
  } else if (typeof value === 'object' && [Object.prototype, null].includes(Object.getPrototypeOf(value))) {
    kind = 'mapping';
    size = Object.keys(value).length;
    preview = render(value);
  } else {
    preview = render(value);
  }
  if (cap > 0 && preview.length > cap) preview = preview.slice(0, cap) + '...';
  return size === undefined ? { name, kind, preview } : { name, kind, size, preview };
}

function print(...args) {
  emit.applySync(undefined, [args.map(render).join(' ')]);
}

define('print', print, true);
define('console', { log: print, info: print, warn: print, error: print, debug: print }, true);

define('llm_query', function llm_query(prompt) {
  if (query === null) {
    throw new Error('llm_query is unavailable at recursion depth ' + depth + ': sub-calls would exceed the recursion limit of ' + limit);
  }
  const reply = JSON.parse(query.applySyncPromise(undefined, [render(prompt)]));
  if (!reply.ok) throw new Error('llm_query failed: ' + reply.message);
  return reply.text;
}, true);

let baseline = new Set();

define('__describe', (name, value, cap) => JSON.stringify(describe(name, value, cap)), false);

define('__listGlobals', (cap) => {
  const out = [];
  for (const name of Object.getOwnPropertyNames(globalThis)) {
    if (baseline.has(name)) continue;
    let value;
    try {
      value = globalThis[name];
    } catch (err) {
      value = err;
    }
    out.push(describe(name, value, cap));
  }
  return JSON.stringify(out);
}, false);

baseline = new Set(Object.getOwnPropertyNames(globalThis));
`;
