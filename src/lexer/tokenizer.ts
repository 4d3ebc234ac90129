/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  lookingAt,
  peek,
} from './state.js';

/** Skip whitespace and comments; newlines are tokens and stay */
function skipTrivia(state: LexerState): void {
  for (;;) {
    while (isWhitespace(peek(state))) {
      advance(state);
    }

    if (lookingAt(state, '//')) {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
      continue;
    }

    if (lookingAt(state, '/*')) {
      const start = currentLocation(state);
      advance(state);
      advance(state);
      while (!lookingAt(state, '*/')) {
        if (isAtEnd(state)) {
          throw new LexerError('TENDA-L004', start);
        }
        advance(state);
      }
      advance(state);
      advance(state);
      continue;
    }

    return;
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '\n') {
    advance(state);
    return makeToken(TOKEN_TYPES.NEWLINE, '\n', start, currentLocation(state));
  }

  if (ch === '"') {
    return readString(state);
  }

  // Positive only: unary minus is handled by the parser
  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  if (lookingAt(state, '...')) {
    return advanceAndMakeToken(state, 3, TOKEN_TYPES.ELLIPSIS, '...', start);
  }

  const twoChar = state.source.slice(state.pos, state.pos + 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw new LexerError('TENDA-L002', start, { char: ch });
}

/**
 * Tokenize source text. The source is normalized to NFC first so that
 * keywords typed with combining accents still match.
 */
export function tokenize(source: string): Token[] {
  const state = createLexerState(source.normalize('NFC'));
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
