/**
 * Scan SQL text for bind parameters and number them the way SQLite does.
 *
 * Only executable SQL segments are scanned; placeholders inside comments and
 * quoted literals/identifiers are ignored.
 */
import { PrepareError, misuse } from '../errors.js';

type State =
  | 'default'
  | 'single_quote'
  | 'double_quote'
  | 'backtick_quote'
  | 'bracket_quote'
  | 'line_comment'
  | 'block_comment';

export interface SqlParameter {
  /** 1-based parameter index. */
  index: number;
  /** Full name including its prefix (`:id`, `@id`, `$id`), or null for `?`. */
  name: string | null;
}

export interface ParameterLayout {
  count: number;
  /** One entry per distinct parameter, ordered by index. */
  parameters: SqlParameter[];
  indexByName: ReadonlyMap<string, number>;
}

const isDigit = (ch: string): boolean => ch >= '0' && ch <= '9';
const isIdentChar = (ch: string): boolean =>
  (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || isDigit(ch) || ch === '_' || ch === '$' || ch > '\x7f';

const CLOSING_QUOTE: Partial<Record<State, string>> = {
  single_quote: "'",
  double_quote: '"',
  backtick_quote: '`',
  bracket_quote: ']',
};

function parseParameterLayout(text: string): ParameterLayout {
  const parameters: SqlParameter[] = [];
  const indexByName = new Map<string, number>();
  const nameByBare = new Map<string, string>();
  let i = 0;
  let state: State = 'default';

  while (i < text.length) {
    const ch = text[i];
    const next = i + 1 < text.length ? text[i + 1] : '';

    if (state === 'default') {
      if (ch === "'") {
        state = 'single_quote';
      } else if (ch === '"') {
        state = 'double_quote';
      } else if (ch === '`') {
        state = 'backtick_quote';
      } else if (ch === '[') {
        state = 'bracket_quote';
      } else if (ch === '-' && next === '-') {
        state = 'line_comment';
        i++;
      } else if (ch === '/' && next === '*') {
        state = 'block_comment';
        i++;
      } else if (ch === '?') {
        if (isDigit(next)) {
          throw misuse(PrepareError, `numbered parameters are not supported: ${text.slice(i, i + 4)}`);
        }
        parameters.push({ index: parameters.length + 1, name: null });
      } else if ((ch === ':' || ch === '@' || ch === '$') && isIdentChar(next)) {
        let j = i + 1;
        while (j < text.length && isIdentChar(text[j])) {
          j++;
        }

        const name = text.slice(i, j);
        // Bound by bare name, so `:id` and `$id` would share one value.
        const bare = name.slice(1);
        const clash = nameByBare.get(bare);
        if (clash !== undefined && clash !== name) {
          throw misuse(PrepareError, `parameters ${clash} and ${name} differ only by prefix`);
        }
        nameByBare.set(bare, name);

        if (!indexByName.has(name)) {
          const index = parameters.length + 1;
          indexByName.set(name, index);
          parameters.push({ index, name });
        }
        i = j;
        continue;
      } else if (isIdentChar(ch)) {
        // `a$b` is one identifier, not `a` followed by `$b`.
        while (i < text.length && isIdentChar(text[i])) {
          i++;
        }
        continue;
      }

      i++;
      continue;
    }

    const closing = CLOSING_QUOTE[state];
    if (closing !== undefined) {
      i++;
      if (ch === closing) {
        // A doubled closing quote is an escaped quote, not the end.
        if (text[i] === closing) {
          i++;
        } else {
          state = 'default';
        }
      }
      continue;
    }

    if (state === 'line_comment') {
      i++;
      if (ch === '\n') {
        state = 'default';
      }
      continue;
    }

    // block_comment
    i++;
    if (ch === '*' && text[i] === '/') {
      i++;
      state = 'default';
    }
  }

  return { count: parameters.length, parameters, indexByName };
}

export interface ParameterScanner {
  scan(text: string): ParameterLayout;
}

export function createParameterScanner(): ParameterScanner {
  const cache = new Map<string, ParameterLayout>();

  const scan = (text: string): ParameterLayout => {
    const cached = cache.get(text);
    if (cached) return cached;

    const layout = parseParameterLayout(text);
    cache.set(text, layout);
    return layout;
  };

  return { scan };
}

const defaultParameterScanner = createParameterScanner();

export function scanParameters(text: string): ParameterLayout {
  return defaultParameterScanner.scan(text);
}
