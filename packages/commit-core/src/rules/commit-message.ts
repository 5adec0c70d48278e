/**
 * Conventional commit message parsing
 *
 * Never throws: a header that does not follow `type(scope)!: subject` comes
 * back with `conventional: false` and the header-format rule reports it.
 */

import { SCOPE_PATTERN } from '@commit-warden/contracts';

const SCOPE = SCOPE_PATTERN.source.slice(1, -1);
const HEADER_PATTERN = new RegExp(
  `^(?<type>[A-Za-z][A-Za-z0-9-]*)(?:\\((?<scope>${SCOPE})\\))?(?<bang>!)?: (?<subject>\\S.*)$`
);
const TRAILER_PATTERN = /^(?<token>BREAKING[ -]CHANGE|[A-Za-z][A-Za-z0-9-]*)(?:: | #)(?<value>.*)$/;

/**
 * Whether `scope` survives a round trip through `type(scope): subject`
 */
export function isValidScope(scope: string): boolean {
  return SCOPE_PATTERN.test(scope);
}

export interface Trailer {
  token: string;
  value: string;
}

export interface ParsedMessage {
  /** Message with comment lines and trailing blank lines removed */
  text: string;
  header: string;
  conventional: boolean;
  type?: string;
  scope?: string;
  subject?: string;
  body?: string;
  trailers: Trailer[];
  /** `!` in the header or a BREAKING CHANGE trailer */
  breaking: boolean;
}

/**
 * Remove `#` comment lines the way `git commit` does, and surrounding blank lines
 */
export function cleanMessage(message: string): string {
  return message
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .filter((line) => !line.startsWith('#'))
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/^\n+/, '')
    .replace(/\n+$/, '');
}

function isTrailerParagraph(lines: string[]): boolean {
  let sawTrailer = false;
  for (const line of lines) {
    if (TRAILER_PATTERN.test(line)) {
      sawTrailer = true;
    } else if (!(sawTrailer && /^\s/.test(line))) {
      return false;
    }
  }
  return sawTrailer;
}

function parseTrailers(lines: string[]): Trailer[] {
  const trailers: Trailer[] = [];
  for (const line of lines) {
    const match = TRAILER_PATTERN.exec(line);
    const last = trailers[trailers.length - 1];
    if (match?.groups) {
      trailers.push({ token: match.groups.token ?? '', value: (match.groups.value ?? '').trim() });
    } else if (last) {
      last.value = `${last.value} ${line.trim()}`;
    }
  }
  return trailers;
}

export function parseCommitMessage(message: string): ParsedMessage {
  const text = cleanMessage(message);
  const [header = '', ...rest] = text.split('\n');

  const paragraphs = rest
    .join('\n')
    .split(/\n{2,}/)
    .map((paragraph) => paragraph.replace(/^\n+|\n+$/g, ''))
    .filter((paragraph) => paragraph.length > 0);

  let trailers: Trailer[] = [];
  const lastParagraph = paragraphs[paragraphs.length - 1];
  if (lastParagraph !== undefined && isTrailerParagraph(lastParagraph.split('\n'))) {
    trailers = parseTrailers(lastParagraph.split('\n'));
    paragraphs.pop();
  }

  const body = paragraphs.length > 0 ? paragraphs.join('\n\n') : undefined;
  const match = HEADER_PATTERN.exec(header);
  const groups = match?.groups;
  const breakingTrailer = trailers.some((t) => /^BREAKING[ -]CHANGE$/.test(t.token));

  return {
    text,
    header,
    conventional: groups !== undefined,
    type: groups?.type,
    scope: groups?.scope?.trim(),
    subject: groups?.subject,
    body,
    trailers,
    breaking: groups?.bang === '!' || breakingTrailer,
  };
}

/**
 * Length in characters (code points), as a reader counts them
 */
export function characterCount(text: string): number {
  return [...text].length;
}
