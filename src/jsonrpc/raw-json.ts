// This module splits a JSON object into the raw source text of its members so values can be echoed unchanged.

// JSON text kept exactly as it appeared on the wire.
export type RawMessage = string;

function isWhitespace(char: string | undefined): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

function skipWhitespace(text: string, index: number): number {
  let cursor = index;
  while (isWhitespace(text[cursor])) {
    cursor += 1;
  }
  return cursor;
}

// Returns the index just past the closing quote of the string starting at index.
function scanString(text: string, index: number): number {
  let cursor = index + 1;
  while (cursor < text.length) {
    const char = text[cursor];
    if (char === '\\') {
      cursor += 2;
      continue;
    }
    if (char === '"') {
      return cursor + 1;
    }
    cursor += 1;
  }

  throw new SyntaxError('Unterminated string in JSON');
}

// Returns the index just past the value starting at index.
function scanValue(text: string, index: number): number {
  const first = text[index];
  if (first === '"') {
    return scanString(text, index);
  }

  if (first === '{' || first === '[') {
    let depth = 0;
    let cursor = index;
    while (cursor < text.length) {
      const char = text[cursor];
      if (char === '"') {
        cursor = scanString(text, cursor);
        continue;
      }
      if (char === '{' || char === '[') {
        depth += 1;
      } else if (char === '}' || char === ']') {
        depth -= 1;
      }
      cursor += 1;
      if (depth === 0) {
        return cursor;
      }
    }

    throw new SyntaxError('Unterminated container in JSON');
  }

  let cursor = index;
  while (cursor < text.length) {
    const char = text[cursor];
    if (char === ',' || char === '}' || char === ']' || isWhitespace(char)) {
      break;
    }
    cursor += 1;
  }

  if (cursor === index) {
    throw new SyntaxError(`Unexpected token in JSON at position ${index}`);
  }
  return cursor;
}

// Expects text to already be valid JSON; the last occurrence of a duplicated key wins, as with JSON.parse.
export function readObjectMembers(text: string): Map<string, RawMessage> {
  const members = new Map<string, RawMessage>();
  let cursor = skipWhitespace(text, 0);

  if (text[cursor] !== '{') {
    throw new SyntaxError('Expected a JSON object');
  }

  cursor = skipWhitespace(text, cursor + 1);
  if (text[cursor] === '}') {
    return members;
  }

  for (;;) {
    if (text[cursor] !== '"') {
      throw new SyntaxError(`Expected a member name at position ${cursor}`);
    }

    const keyEnd = scanString(text, cursor);
    const key: unknown = JSON.parse(text.slice(cursor, keyEnd));
    cursor = skipWhitespace(text, keyEnd);

    if (text[cursor] !== ':') {
      throw new SyntaxError(`Expected ':' at position ${cursor}`);
    }

    cursor = skipWhitespace(text, cursor + 1);
    const valueEnd = scanValue(text, cursor);
    members.set(String(key), text.slice(cursor, valueEnd));
    cursor = skipWhitespace(text, valueEnd);

    if (text[cursor] === ',') {
      cursor = skipWhitespace(text, cursor + 1);
      continue;
    }

    if (text[cursor] === '}') {
      return members;
    }

    throw new SyntaxError(`Expected ',' or '}' at position ${cursor}`);
  }
}
