/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory =
  | 'transcode'
  | 'lexer'
  | 'string'
  | 'format'
  | 'path'
  | 'config';

/** Error severity level */
export type ErrorSeverity = 'error' | 'warning';

/**
 * Example demonstrating an error condition.
 * Used by `textkit explain` to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Input demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TEXT-{category letter}{3-digit} (e.g., TEXT-U001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Severity level (defaults to 'error' when omitted) */
  readonly severity?: ErrorSeverity | undefined;
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

/** Error ID prefix letter per category */
export const CATEGORY_LETTERS: Readonly<Record<ErrorCategory, string>> = {
  transcode: 'U',
  lexer: 'L',
  string: 'S',
  format: 'F',
  path: 'P',
  config: 'C',
};

/** Pattern every registered error ID follows */
export const ERROR_ID_PATTERN = /^TEXT-[ULSFPC]\d{3}$/;

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
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
      if (!ERROR_ID_PATTERN.test(def.errorId)) {
        throw new TypeError(`Malformed error ID: ${def.errorId}`);
      }
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

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Transcode Errors (TEXT-U0xx)
  {
    errorId: 'TEXT-U001',
    category: 'transcode',
    description: 'Invalid transcoder argument',
    messageTemplate: 'Invalid argument while transcoding {from} to {to}',
    cause:
      'The source was null, its declared length exceeded the buffer, or a multi-byte sequence was cut off by the end of input.',
    resolution:
      'Pass a source buffer and a length no larger than it. Truncated sequences must be completed or removed before transcoding.',
    examples: [
      {
        description: 'UTF-8 lead byte of a 3-byte sequence at end of input',
        code: 'E2 82',
      },
      {
        description: 'UTF-16 high surrogate with no following unit',
        code: 'D83D',
      },
    ],
  },
  {
    errorId: 'TEXT-U002',
    category: 'transcode',
    description: 'Invalid code point',
    messageTemplate:
      'Invalid code point in {from} input at unit {processed}',
    cause:
      'The input contains a forbidden byte, a lone surrogate, or a value above U+10FFFF while strict decoding was requested.',
    resolution:
      'Clear the error-on-invalid-code-point flag to substitute U+FFFD, or repair the input.',
    examples: [
      {
        description: 'Forbidden UTF-8 octet',
        code: 'C0',
      },
    ],
  },
  {
    errorId: 'TEXT-U003',
    category: 'transcode',
    description: 'Byte-order mark rejected',
    messageTemplate: 'Byte-order mark found in {from} input',
    cause: 'The input starts with a byte-order mark and BOMs were forbidden.',
    resolution: 'Clear the forbid-BOM flag or strip the mark first.',
    examples: [
      {
        description: 'UTF-8 byte-order mark',
        code: 'EF BB BF 61',
      },
    ],
  },
  {
    errorId: 'TEXT-U004',
    category: 'transcode',
    description: 'Destination buffer too small',
    messageTemplate:
      'Destination capacity {capacity} exhausted after {length} units',
    cause: 'The destination buffer filled before the source was consumed.',
    resolution:
      'Measure first by passing a null destination, then allocate the reported length.',
  },

  // Lexer Errors (TEXT-L0xx)
  {
    errorId: 'TEXT-L001',
    category: 'lexer',
    description: 'Malformed numeric literal',
    messageTemplate: 'Malformed numeric literal {text}',
    cause: 'An exponent marker was not followed by at least one digit.',
    resolution: 'Add exponent digits (1e5, 0x1p3) or remove the marker.',
    examples: [
      {
        description: 'Decimal exponent without digits',
        code: '1e+',
      },
      {
        description: 'Hex float exponent without digits',
        code: '0x1.8p',
      },
    ],
  },
  {
    errorId: 'TEXT-L002',
    category: 'lexer',
    description: 'Token cannot be transformed',
    messageTemplate: 'Cannot transform {type} token',
    cause: 'The value of an error token was requested.',
    resolution: 'Only transform tokens produced by a successful advance.',
  },

  // Dynamic String Errors (TEXT-S0xx)
  {
    errorId: 'TEXT-S001',
    category: 'string',
    description: 'String capacity exceeded',
    messageTemplate:
      'Cannot grow string to {required} bytes (limit {maxCapacity})',
    cause: 'A mutation required more capacity than the string allows.',
    resolution: 'Raise maxCapacity or split the content.',
  },
  {
    errorId: 'TEXT-S002',
    category: 'string',
    description: 'Invalid string argument',
    messageTemplate: 'Invalid string argument: {reason}',
    cause: 'A negative or non-integer size or offset was supplied.',
    resolution: 'Pass non-negative integer sizes and offsets.',
  },

  // Format Errors (TEXT-F0xx)
  {
    errorId: 'TEXT-F001',
    category: 'format',
    description: 'Argument type mismatch',
    messageTemplate:
      'Conversion %{conversion} cannot format argument of type {type}',
    cause: 'The argument does not match the conversion character.',
    resolution:
      'Pass numbers or bigints to numeric conversions, strings to %s, and a { value } holder to %n.',
    examples: [
      {
        description: 'Object passed to %d',
        code: "format('%d', {})",
      },
    ],
  },
  {
    errorId: 'TEXT-F002',
    category: 'format',
    description: 'Missing format argument',
    messageTemplate: 'Missing argument {index} for format string',
    cause: 'The format string consumes more arguments than were passed.',
    resolution: 'Pass one argument per conversion and per * width.',
  },

  // Path Errors (TEXT-P0xx)
  {
    errorId: 'TEXT-P001',
    category: 'path',
    description: 'Segment outside path',
    messageTemplate: 'Segment {offset}+{length} lies outside the path',
    cause: 'A path segment does not describe a range of its own path.',
    resolution: 'Only iterate from segments returned by pathFirst or pathLast.',
  },

  // Config Errors (TEXT-C0xx)
  {
    errorId: 'TEXT-C001',
    category: 'config',
    description: 'Unreadable configuration',
    messageTemplate: 'Failed to parse {file}: {details}',
    cause: 'The configuration file is not valid YAML.',
    resolution: 'Fix the YAML syntax reported in the details.',
  },
  {
    errorId: 'TEXT-C002',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {details}',
    cause: 'A configuration key is unknown or has the wrong type.',
    resolution:
      'Use only the lexer, format and transcode sections with their documented keys.',
    examples: [
      {
        description: 'Separator longer than one character',
        code: 'format:\n  thousandsSeparator: ",,"',
      },
    ],
  },
];

/** All error definitions indexed by error ID */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template by replacing `{name}` placeholders.
 *
 * Missing values render as an empty string. An unclosed brace returns the
 * template unchanged.
 *
 * @example
 * renderMessage('Missing argument {index}', { index: 2 })
 * // Returns: "Missing argument 2"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
