import { TriviaKind, type Trivia } from '../syntax/types';

/*
 * Index of the first trivia item that is not whitespace, or the list length
 * when the whole list is whitespace.
 */
export function indexAfterWhitespace(trivia: readonly Trivia[]): number {
  let cursor = 0;
  while (cursor < trivia.length && trivia[cursor]?.kind === TriviaKind.Whitespace) {
    cursor++;
  }
  return cursor;
}

export function leadingWhitespaceRun(trivia: readonly Trivia[]): string {
  return trivia
    .slice(0, indexAfterWhitespace(trivia))
    .map((t) => t.text)
    .join('');
}

export function countLineBreaksAfter(trivia: readonly Trivia[], fromIndex: number): number {
  let count = 0;
  for (let i = Math.max(0, fromIndex); i < trivia.length; i++) {
    if (trivia[i]?.kind === TriviaKind.EndOfLine) count++;
  }
  return count;
}

export function lastIndexOfKind(trivia: readonly Trivia[], kind: TriviaKind): number {
  for (let i = trivia.length - 1; i >= 0; i--) {
    if (trivia[i]?.kind === kind) return i;
  }
  return -1;
}

/** Width of a whitespace run with every tab counted as `tabWidth` columns. */
export function renderedWidth(whitespace: string, tabWidth: number): number {
  let width = 0;
  for (const ch of whitespace) {
    width += ch === '\t' ? tabWidth : 1;
  }
  return width;
}
