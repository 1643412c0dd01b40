/**
 * Front-Matter Types
 *
 * A front-matter block is the `---`-delimited header at the top of a
 * plugin document. Values are a tagged union so consumers never have to
 * guess whether a key holds one string or a list.
 */

export interface ScalarValue {
  kind: 'scalar';
  value: string;
}

export interface ListValue {
  kind: 'list';
  items: string[];
}

export type FrontMatterValue = ScalarValue | ListValue;

/** Ordered key → value mapping of one block */
export type FrontMatter = ReadonlyMap<string, FrontMatterValue>;

/** Keys whose value is a comma-separated list */
export const LIST_KEYS: ReadonlySet<string> = new Set(['tools', 'allowed-tools']);

export interface MalformedFrontMatter {
  kind: 'MalformedFrontMatter';
  message: string;
  /** 1-based line number in the source text, when the failure has one */
  line?: number;
}

export type FrontMatterParseResult =
  | { ok: true; frontMatter: FrontMatter; body: string }
  | { ok: false; error: MalformedFrontMatter };

export function scalar(value: string): ScalarValue {
  return { kind: 'scalar', value };
}

export function list(items: string[]): ListValue {
  return { kind: 'list', items };
}

/**
 * Read a key as plain data: a string for scalars, a string array for lists
 */
export function toPlainObject(frontMatter: FrontMatter): Record<string, string | string[]> {
  return Object.fromEntries(
    Array.from(frontMatter, ([key, value]) => [
      key,
      value.kind === 'list' ? [...value.items] : value.value,
    ])
  );
}
