/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'load' | 'runtime' | 'conversion' | 'io';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: CONF-{category}{3-digit} (e.g., CONF-R001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Load Errors (CONF-L0xx)
  {
    errorId: 'CONF-L001',
    category: 'load',
    description: 'Script failed to compile',
    messageTemplate: 'Failed to load {file}: {detail}',
    cause: 'The script contains a syntax error and could not be compiled.',
    resolution:
      'Fix the syntax at the line reported in the message and rerun the build.',
  },

  // Runtime Errors (CONF-R0xx)
  {
    errorId: 'CONF-R001',
    category: 'runtime',
    description: 'Script raised an error',
    messageTemplate: 'Failed to run {file}: {detail}',
    cause:
      'The script raised an error while running, such as indexing a nil value, calling vars() without exactly one string argument, or importing itself until the call depth limit was hit.',
    resolution:
      'Check the reported line. Make sure referenced variables exist and every vars() call passes one fragment name.',
  },

  // Conversion Errors (CONF-C0xx)
  {
    errorId: 'CONF-C001',
    category: 'conversion',
    description: 'Unsupported table key type',
    messageTemplate:
      '{path} contains a key of unsupported type {type}; must be string or integer',
    cause: 'A table uses a boolean, table or function as a key.',
    resolution: 'Use string or integer keys in every emitted table.',
  },
  {
    errorId: 'CONF-C002',
    category: 'conversion',
    description: 'Unsupported value type',
    messageTemplate: 'Failed to extract {path}: not a supported type',
    cause:
      'An emitted binding holds a function, coroutine or userdata, which has no document representation.',
    resolution:
      'Store only strings, numbers, booleans, nil and tables, or rename the binding in lowercase to keep it out of the document.',
  },
  {
    errorId: 'CONF-C003',
    category: 'conversion',
    description: 'Index cannot be placed in an array',
    messageTemplate:
      '{path} contains index {index} which cannot be placed in an array',
    cause:
      'A table without string keys uses a negative or non-finite numeric index, or an index above the array length limit.',
    resolution:
      'Use indices starting at 1 (or 0), or add a string key so the table converts to an object.',
  },

  {
    errorId: 'CONF-C004',
    category: 'conversion',
    description: 'String is not valid UTF-8',
    messageTemplate: '{path} contains a string that is not valid UTF-8',
    cause:
      'A string value or key holds bytes that do not decode as UTF-8, such as a "\\xff" escape or a file saved in another encoding.',
    resolution: 'Save scripts as UTF-8 and emit text only.',
  },
  {
    errorId: 'CONF-C005',
    category: 'conversion',
    description: 'Table contains itself',
    messageTemplate: '{path} refers back to a table that contains it',
    cause:
      'A table reaches itself through its own entries, for example T.SELF = T or an emitted _G.',
    resolution:
      'Break the cycle, or keep the back reference in a lowercase binding that is not emitted.',
  },
  {
    errorId: 'CONF-C006',
    category: 'conversion',
    description: 'Number has no JSON representation',
    messageTemplate: 'Failed to extract {path}: {value} cannot be written as JSON',
    cause: 'A value is math.huge, -math.huge or 0/0 and the output format is JSON.',
    resolution: 'Use finite numbers, or write YAML, which has .inf and .nan.',
  },

  // I/O Errors (CONF-I0xx)
  {
    errorId: 'CONF-I001',
    category: 'io',
    description: 'File could not be read',
    messageTemplate: 'Failed to read {file}: {detail}',
    cause: 'A script or fragment file is missing or unreadable.',
    resolution:
      'Check the path. Fragments resolve to <input>/vars/<name>.conf.',
  },
  {
    errorId: 'CONF-I002',
    category: 'io',
    description: 'File could not be written',
    messageTemplate: 'Failed to write {file}: {detail}',
    cause: 'The output directory is not writable.',
    resolution: 'Check permissions on the output directory.',
  },
  {
    errorId: 'CONF-I003',
    category: 'io',
    description: 'Directory could not be listed',
    messageTemplate: 'Failed to list {dir}: {detail}',
    cause: 'The input tree is missing the environments or apps directory.',
    resolution:
      'Create <input>/environments and <input>/apps, or point the compiler at the right input root.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Failed to read {file}: {detail}", { file: "a.conf", detail: "ENOENT" })
 * // Returns: "Failed to read a.conf: ENOENT"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i];

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      // Unclosed brace
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
