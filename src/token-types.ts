import standardTypeNames from './data/token-types.json';

/**
 * A node in the category hierarchy. Each category is created once and reused,
 * so two categories are the same exactly when they are the same object.
 */
export class TokenType {
  readonly name: string;
  readonly parent: TokenType | undefined;
  readonly depth: number;
  private readonly children = new Map<string, TokenType>();

  private constructor(name: string, parent: TokenType | undefined) {
    this.name = name;
    this.parent = parent;
    this.depth = parent ? parent.depth + 1 : 0;
  }

  /** @internal */
  static createRoot(): TokenType {
    return new TokenType('Token', undefined);
  }

  /** Return the child category called `name`, creating it on first use. */
  subtype(name: string): TokenType {
    if (!/^[A-Za-z][A-Za-z0-9_]*$/.test(name)) {
      throw new Error(`Invalid token type name "${name}"`);
    }
    let child = this.children.get(name);
    if (!child) {
      child = new TokenType(name, this);
      this.children.set(name, child);
    }
    return child;
  }

  /** True when `this` is `other` or sits anywhere below it. */
  isSubtypeOf(other: TokenType): boolean {
    let current: TokenType | undefined = this;
    while (current && current.depth >= other.depth) {
      if (current === other) return true;
      current = current.parent;
    }
    return false;
  }

  /** Path from the root, e.g. `['Literal', 'String', 'Doc']`. The root's path is empty. */
  path(): string[] {
    const parts: string[] = [];
    for (let t: TokenType | undefined = this; t && t.parent; t = t.parent) {
      parts.push(t.name);
    }
    return parts.reverse();
  }

  toString(): string {
    return ['Token', ...this.path()].join('.');
  }
}

/** Root of the hierarchy. Every other category descends from it. */
export const RootToken = TokenType.createRoot();

/**
 * Resolve a dotted category path such as `Literal.String.Doc`.
 * A leading `Token.` is optional; `''` and `'Token'` name the root.
 */
export function tokenType(path: string): TokenType {
  const trimmed = path.trim();
  if (trimmed === '' || trimmed === 'Token') return RootToken;
  const parts = trimmed.split('.');
  if (parts[0] === 'Token') parts.shift();
  let current = RootToken;
  for (const part of parts) {
    current = current.subtype(part);
  }
  return current;
}

const STANDARD_TYPES: readonly TokenType[] = standardTypeNames.map(name => tokenType(name));

/** The root followed by every standard category, in a fixed order. */
export function standardTokenTypes(): readonly TokenType[] {
  return [RootToken, ...STANDARD_TYPES];
}

export const Text = tokenType('Text');
export const Whitespace = tokenType('Text.Whitespace');
export const ErrorToken = tokenType('Error');
export const Keyword = tokenType('Keyword');
export const Name = tokenType('Name');
export const Literal = tokenType('Literal');
export const StringToken = tokenType('Literal.String');
export const DocString = tokenType('Literal.String.Doc');
export const NumberToken = tokenType('Literal.Number');
export const Operator = tokenType('Operator');
export const Punctuation = tokenType('Punctuation');
export const Comment = tokenType('Comment');
export const Generic = tokenType('Generic');
