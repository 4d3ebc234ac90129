/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TENDA-{category}{3-digit} (e.g., TENDA-R001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Diagnostic kind rendered by this entry (runtime entries only) */
  readonly kind?: string | undefined;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** How to resolve this error, shown as an `ajuda` line */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup by ID and
 * by diagnostic kind. Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  getByKind(kind: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;
  private readonly byKind: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    const kindMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
      if (def.kind !== undefined) {
        kindMap.set(def.kind, def);
      }
    }

    this.byId = idMap;
    this.byKind = kindMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  getByKind(kind: string): ErrorDefinition | undefined {
    return this.byKind.get(kind);
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
  // Lexer Errors (TENDA-L0xx)
  {
    errorId: 'TENDA-L001',
    category: 'lexer',
    description: 'Unterminated text literal',
    messageTemplate: 'Texto não terminado',
    resolution: 'feche o texto com aspas ou use \\n para quebrar a linha',
  },
  {
    errorId: 'TENDA-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: 'Caractere inválido: {char}',
  },
  {
    errorId: 'TENDA-L003',
    category: 'lexer',
    description: 'Invalid number format',
    messageTemplate: 'Número mal formado: {value}',
  },
  {
    errorId: 'TENDA-L004',
    category: 'lexer',
    description: 'Unterminated block comment',
    messageTemplate: 'Comentário de bloco não terminado',
    resolution: 'feche o comentário com */',
  },
  {
    errorId: 'TENDA-L005',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'Sequência de escape inválida: \\{sequence}',
    resolution: 'as sequências aceitas são \\n, \\r, \\t, \\\\ e \\"',
  },

  // Parse Errors (TENDA-P0xx)
  {
    errorId: 'TENDA-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Símbolo inesperado: {token}',
  },
  {
    errorId: 'TENDA-P002',
    category: 'parse',
    description: 'Unexpected end of input',
    messageTemplate: 'Fim inesperado do código',
    resolution: 'verifique se falta um fim',
  },
  {
    errorId: 'TENDA-P003',
    category: 'parse',
    description: 'Invalid assignment target',
    messageTemplate: 'Alvo de atribuição inválido',
  },
  {
    errorId: 'TENDA-P004',
    category: 'parse',
    description: 'Statement outside its context',
    messageTemplate: '{statement} só pode ser usado {context}',
  },
  {
    errorId: 'TENDA-P005',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: 'Esperado {expected}',
  },
  {
    errorId: 'TENDA-P006',
    category: 'parse',
    description: 'Invalid parameter list',
    messageTemplate: 'Lista de parâmetros inválida: {reason}',
  },

  // Runtime Errors (TENDA-R0xx)
  {
    errorId: 'TENDA-R001',
    category: 'runtime',
    kind: 'AlreadyDeclared',
    description: 'Name already declared in scope',
    messageTemplate: "A variável '{name}' já foi declarada neste escopo",
    resolution: 'para mudar o valor, use nome = valor',
  },
  {
    errorId: 'TENDA-R002',
    category: 'runtime',
    kind: 'UndefinedVariable',
    description: 'Undefined variable',
    messageTemplate: "A variável '{name}' não está definida",
    resolution: 'declare o nome com seja antes de usá-lo',
  },
  {
    errorId: 'TENDA-R003',
    category: 'runtime',
    kind: 'TypeMismatch',
    description: 'Operation applied to incompatible values',
    messageTemplate: "Operação '{operation}' não suportada para {operands}",
  },
  {
    errorId: 'TENDA-R004',
    category: 'runtime',
    kind: 'ArityMismatch',
    description: 'Wrong number of arguments',
    messageTemplate: '{callee} esperava {expected} argumento(s), mas recebeu {found}',
  },
  {
    errorId: 'TENDA-R005',
    category: 'runtime',
    kind: 'DivisionByZero',
    description: 'Division by zero',
    messageTemplate: 'Divisão por zero',
  },
  {
    errorId: 'TENDA-R006',
    category: 'runtime',
    kind: 'UserRaised',
    description: 'Error raised by the program',
    messageTemplate: 'Erro lançado: {value}',
  },
  {
    errorId: 'TENDA-R007',
    category: 'runtime',
    kind: 'StackOverflow',
    description: 'Recursion limit exceeded',
    messageTemplate: 'Limite de {limit} chamadas aninhadas excedido',
    resolution: 'verifique se a recursão chega a um caso de parada',
  },
  {
    errorId: 'TENDA-R008',
    category: 'runtime',
    kind: 'ImmutableBinding',
    description: 'Assignment to a built-in name',
    messageTemplate: "A função embutida '{name}' não pode ser reatribuída",
  },
  {
    errorId: 'TENDA-R009',
    category: 'runtime',
    kind: 'IndexOutOfBounds',
    description: 'Index out of bounds',
    messageTemplate: 'Índice {index} fora dos limites (tamanho {length})',
  },
  {
    errorId: 'TENDA-R010',
    category: 'runtime',
    kind: 'InvalidIndex',
    description: 'Index is not a non-negative integer',
    messageTemplate: 'Índice inválido: {index}',
  },
  {
    errorId: 'TENDA-R011',
    category: 'runtime',
    kind: 'KeyNotFound',
    description: 'Dictionary key not found',
    messageTemplate: 'Chave {key} não encontrada no dicionário',
  },
  {
    errorId: 'TENDA-R012',
    category: 'runtime',
    kind: 'InvalidKey',
    description: 'Invalid dictionary key',
    messageTemplate:
      'Chave inválida: {key}; chaves devem ser texto ou número inteiro',
  },
  {
    errorId: 'TENDA-R013',
    category: 'runtime',
    kind: 'NotIterable',
    description: 'Value is not iterable',
    messageTemplate: 'Valor do tipo {valueType} não é iterável',
  },
  {
    errorId: 'TENDA-R014',
    category: 'runtime',
    kind: 'NotCallable',
    description: 'Value is not callable',
    messageTemplate: 'Valor do tipo {valueType} não é uma função',
  },
  {
    errorId: 'TENDA-R015',
    category: 'runtime',
    kind: 'ImmutableText',
    description: 'Assignment to a text index',
    messageTemplate: 'Textos são imutáveis; não é possível atribuir a um índice',
  },
  {
    errorId: 'TENDA-R016',
    category: 'runtime',
    kind: 'InvalidRangeBounds',
    description: 'Range bounds are not integers',
    messageTemplate: 'Limites de intervalo inválidos: {start} até {end}',
  },
  {
    errorId: 'TENDA-R017',
    category: 'runtime',
    kind: 'InvalidArgument',
    description: 'Invalid argument to a built-in',
    messageTemplate: 'Argumento inválido para {callee}: {reason}',
  },
  {
    errorId: 'TENDA-R018',
    category: 'runtime',
    kind: 'ModuleNotFound',
    description: 'Imported module not found',
    messageTemplate: "Módulo '{specifier}' não encontrado",
  },
  {
    errorId: 'TENDA-R019',
    category: 'runtime',
    kind: 'CircularImport',
    description: 'Module imported while still executing',
    messageTemplate: "Importação circular do módulo '{module}'",
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
 * renderMessage("Esperado {expected}", { expected: "fim" })
 * // Returns: "Esperado fim"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

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
