/**
 * lattice-di - Parameter names
 *
 * Best-effort extraction of parameter names from a function's source text.
 * Names only improve error messages; resolution never depends on them.
 */

const CONSTRUCTOR_PATTERN = /(?:^|[^.\w$])constructor\s*\(/;
const SINGLE_PARAM_ARROW_PATTERN = /^(?:async\s+)?([\w$]+)\s*=>/;
const IDENTIFIER_PATTERN = /^[A-Za-z_$][\w$]*$/;

/**
 * Returns the declared parameter names of a class constructor or function.
 * Destructured parameters and unparsable entries come back as `''`.
 *
 * @example
 * ```typescript
 * class UserService {
 *   constructor(db: Database, logger: Logger) {}
 * }
 * getParameterNames(UserService); // ['db', 'logger']
 * getParameterNames((config, clock = systemClock) => ...); // ['config', 'clock']
 * ```
 */
export function getParameterNames(fn: Function): string[] {
  const source = stripComments(Function.prototype.toString.call(fn));
  const list = extractParameterList(source);
  if (list === undefined || list.trim() === '') {
    return [];
  }
  return splitTopLevel(list, ',').map(toParameterName);
}

function extractParameterList(source: string): string | undefined {
  if (/^class[\s{]/.test(source)) {
    const match = CONSTRUCTOR_PATTERN.exec(source);
    if (!match) return undefined;
    return readParenthesized(source, match.index + match[0].length - 1);
  }

  const arrow = SINGLE_PARAM_ARROW_PATTERN.exec(source);
  if (arrow) {
    return arrow[1];
  }

  const open = source.indexOf('(');
  return open === -1 ? undefined : readParenthesized(source, open);
}

/**
 * Text between the parenthesis at `open` and its matching close.
 */
function readParenthesized(source: string, open: number): string | undefined {
  let depth = 0;
  let quote: string | undefined;

  for (let i = open; i < source.length; i++) {
    const char = source[i];

    if (quote) {
      if (char === '\\') i++;
      else if (char === quote) quote = undefined;
      continue;
    }

    if (char === '"' || char === "'" || char === '`') {
      quote = char;
    } else if (char === '(' || char === '[' || char === '{') {
      depth++;
    } else if (char === ')' || char === ']' || char === '}') {
      depth--;
      if (depth === 0) {
        return source.slice(open + 1, i);
      }
    }
  }

  return undefined;
}

function splitTopLevel(list: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let start = 0;

  for (let i = 0; i < list.length; i++) {
    const char = list[i];

    if (quote) {
      if (char === '\\') i++;
      else if (char === quote) quote = undefined;
      continue;
    }

    if (char === '"' || char === "'" || char === '`') quote = char;
    else if (char === '(' || char === '[' || char === '{') depth++;
    else if (char === ')' || char === ']' || char === '}') depth--;
    else if (char === separator && depth === 0) {
      parts.push(list.slice(start, i));
      start = i + 1;
    }
  }

  parts.push(list.slice(start));
  return parts;
}

function toParameterName(raw: string): string {
  const [declaration = ''] = splitTopLevel(raw, '=');
  const name = declaration.trim().replace(/^\.\.\./, '');
  return IDENTIFIER_PATTERN.test(name) ? name : '';
}

function stripComments(source: string): string {
  return source.replace(/\/\*[\s\S]*?\*\//g, '').replace(/\/\/[^\n]*/g, '');
}
