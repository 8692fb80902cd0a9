/**
 * Pattern Matcher - Compiles descriptor matchers and translation templates
 */

import type { MatchCaptures, Matcher, MatcherType, Template } from './types';
import { TranslationError } from './errors';

const NO_CAPTURES: MatchCaptures = Object.freeze({ groups: [], named: {} });

/**
 * Compile a matcher descriptor into a recognizer over trimmed rule text.
 * Throws if the expression cannot be compiled.
 */
export function compileMatcher(type: MatcherType, expression: string, ignoreCase = false): Matcher {
  switch (type) {
    case 'regex': {
      // Full match on the whole rule text
      const regex = new RegExp(`^(?:${expression})$`, ignoreCase ? 'i' : '');
      return {
        type,
        expression,
        match: (text) => capturesOf(regex.exec(text))
      };
    }

    case 'glob': {
      const regex = globToRegExp(expression, ignoreCase);
      return {
        type,
        expression,
        match: (text) => capturesOf(regex.exec(text))
      };
    }

    case 'token': {
      const token = ignoreCase ? expression.toLowerCase() : expression;
      return {
        type,
        expression,
        match: (text) => ((ignoreCase ? text.toLowerCase() : text).includes(token) ? NO_CAPTURES : null)
      };
    }

    case 'prefix': {
      const prefix = ignoreCase ? expression.toLowerCase() : expression;
      return {
        type,
        expression,
        match: (text) => ((ignoreCase ? text.toLowerCase() : text).startsWith(prefix) ? NO_CAPTURES : null)
      };
    }
  }
}

/**
 * Convert a glob pattern to an anchored regex.
 * `*` matches zero or more chars and `?` exactly one; each wildcard is a
 * capture group so templates can refer to it.
 */
export function globToRegExp(pattern: string, ignoreCase = false): RegExp {
  const regexPattern = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '(.*)')
    .replace(/\?/g, '(.)');

  return new RegExp(`^${regexPattern}$`, ignoreCase ? 'i' : '');
}

function capturesOf(match: RegExpExecArray | null): MatchCaptures | null {
  if (!match) {
    return null;
  }
  return {
    groups: match.slice(1),
    named: match.groups ? { ...match.groups } : {}
  };
}

type Segment =
  | { kind: 'literal'; text: string }
  | { kind: 'index'; index: number }
  | { kind: 'name'; name: string };

/**
 * Compile a translation template.
 *
 * `{0}` refers to the first capture group, `{name}` to a named group and
 * `{{` / `}}` are literal braces. Throws on malformed placeholders.
 */
export function compileTemplate(source: string): Template {
  const segments = parseTemplate(source);

  return {
    source,
    apply(captures: MatchCaptures): string {
      let output = '';
      for (const segment of segments) {
        switch (segment.kind) {
          case 'literal':
            output += segment.text;
            break;
          case 'index':
            if (segment.index >= captures.groups.length) {
              throw new TranslationError(
                `template refers to group {${segment.index}} but the match has ${captures.groups.length} group(s)`
              );
            }
            output += captures.groups[segment.index] ?? '';
            break;
          case 'name':
            if (!(segment.name in captures.named)) {
              throw new TranslationError(`template refers to unknown group {${segment.name}}`);
            }
            output += captures.named[segment.name] ?? '';
            break;
        }
      }
      return output;
    }
  };
}

function parseTemplate(source: string): Segment[] {
  const segments: Segment[] = [];
  let literal = '';
  let i = 0;

  while (i < source.length) {
    const char = source[i];

    if (char === '{' && source[i + 1] === '{') {
      literal += '{';
      i += 2;
      continue;
    }
    if (char === '}' && source[i + 1] === '}') {
      literal += '}';
      i += 2;
      continue;
    }
    if (char === '}') {
      throw new Error(`unmatched '}' at offset ${i}`);
    }
    if (char !== '{') {
      literal += char;
      i++;
      continue;
    }

    const close = source.indexOf('}', i + 1);
    if (close === -1) {
      throw new Error(`unclosed placeholder at offset ${i}`);
    }
    const key = source.slice(i + 1, close);

    if (literal) {
      segments.push({ kind: 'literal', text: literal });
      literal = '';
    }
    if (/^\d+$/.test(key)) {
      segments.push({ kind: 'index', index: Number(key) });
    } else if (/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      segments.push({ kind: 'name', name: key });
    } else {
      throw new Error(`invalid placeholder '{${key}}'`);
    }
    i = close + 1;
  }

  if (literal) {
    segments.push({ kind: 'literal', text: literal });
  }
  return segments;
}
