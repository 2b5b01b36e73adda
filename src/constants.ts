/**
 * State a conversation starts in when the store has nothing for its chat id
 */
export const DEFAULT_INITIAL_STATE_ID = 'start' as const;

/**
 * Parameter names a step handler is documented with.
 * Inline handlers may name them freely; only the count and shape are checked.
 */
export const HANDLER_PARAMETERS = [
  'chatId',
  'userInput',
  'context',
  'sender',
] as const;

/**
 * Names that bring another module's bindings into scope in CommonJS code
 */
export const IMPORT_FACILITY_NAMES = ['require', 'module', 'exports'] as const;

/**
 * Default deny set for inline handler source.
 * Any reference to one of these names rejects the source, whether as a bare
 * identifier, a binding, a member property or a destructured key.
 */
export const DEFAULT_BLOCKED_NAMES = [
  // process and OS access
  'process',
  'os',
  'global',
  'globalThis',
  // process spawning
  'child_process',
  'spawnSync',
  'execSync',
  'execFile',
  'execFileSync',
  'Worker',
  // dynamic evaluation
  'eval',
  'Function',
  // dynamic compilation
  'vm',
  'WebAssembly',
  'compileFunction',
  'runInContext',
  'runInNewContext',
  'runInThisContext',
  // filesystem
  'fs',
  'readFile',
  'readFileSync',
  'writeFile',
  'writeFileSync',
  'openSync',
  // reflective access
  'constructor',
  '__proto__',
  'getPrototypeOf',
  'setPrototypeOf',
  'Reflect',
  'Proxy',
] as const;

/**
 * Longest context preview written to debug logs
 */
export const CONTEXT_PREVIEW_LENGTH = 200;
