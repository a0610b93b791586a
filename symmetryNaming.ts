export type Side = -1 | 0 | 1;
export type SymmetryAxis = 'lr' | 'fb';
export type NamePrefix = 'ORG' | 'MCH' | 'DEF';
export type DerivedKind = 'org' | 'mch' | 'def' | 'ctrl';

export interface SymmetryTag {
  axis: SymmetryAxis;
  side: Exclude<Side, 0>;
  separator: string;
  text: string;
}

export interface ParsedName {
  prefix: NamePrefix | null;
  base: string;
  fb: SymmetryTag | null;
  lr: SymmetryTag | null;
  /** Trailing duplicate counter such as `.001`, kept verbatim. */
  order: string | null;
}

/** Derived identity used for sibling matching. Never stored, always recomputed from a name. */
export interface SymmetryKey {
  base: string;
  order: number | null;
  lr: Side;
  fb: Side;
}

interface TagSpelling {
  positive: string;
  negative: string;
}

const LR_SPELLINGS: TagSpelling[] = [
  { positive: 'L', negative: 'R' },
  { positive: 'l', negative: 'r' },
  { positive: 'Left', negative: 'Right' },
  { positive: 'left', negative: 'right' },
  { positive: 'LEFT', negative: 'RIGHT' },
];

const FB_SPELLINGS: TagSpelling[] = [
  { positive: 'Fr', negative: 'Bk' },
  { positive: 'Front', negative: 'Back' },
  { positive: 'front', negative: 'back' },
  { positive: 'FRONT', negative: 'BACK' },
];

const SPELLINGS: Record<SymmetryAxis, TagSpelling[]> = {
  lr: LR_SPELLINGS,
  fb: FB_SPELLINGS,
};

const SEPARATORS = ['.', '_', '-'];
const PREFIX_PATTERN = /^(ORG|MCH|DEF)-(.+)$/;
const ORDER_PATTERN = /^(.+)(\.\d+)$/;

const PREFIX_BY_KIND: Record<DerivedKind, NamePrefix | null> = {
  org: 'ORG',
  mch: 'MCH',
  def: 'DEF',
  ctrl: null,
};

const isNamePrefix = (value: string): value is NamePrefix =>
  value === 'ORG' || value === 'MCH' || value === 'DEF';

const splitTag = (name: string, axis: SymmetryAxis): [string, SymmetryTag | null] => {
  for (const spelling of SPELLINGS[axis]) {
    for (const [text, side] of [[spelling.positive, 1], [spelling.negative, -1]] as const) {
      for (const separator of SEPARATORS) {
        const suffix = separator + text;
        if (name.length > suffix.length && name.endsWith(suffix)) {
          return [name.slice(0, -suffix.length), { axis, side, separator, text }];
        }
      }
    }
  }
  return [name, null];
};

export const parseSymmetryName = (name: string): ParsedName => {
  let rest = name;
  let prefix: NamePrefix | null = null;

  const prefixMatch = PREFIX_PATTERN.exec(rest);
  if (prefixMatch && isNamePrefix(prefixMatch[1])) {
    prefix = prefixMatch[1];
    rest = prefixMatch[2];
  }

  let order: string | null = null;
  const orderMatch = ORDER_PATTERN.exec(rest);
  if (orderMatch) {
    rest = orderMatch[1];
    order = orderMatch[2];
  }

  const [withoutLr, lr] = splitTag(rest, 'lr');
  const [base, fb] = splitTag(withoutLr, 'fb');

  return { prefix, base, fb, lr, order };
};

const formatTag = (tag: SymmetryTag | null): string => (tag ? tag.separator + tag.text : '');

export const formatSymmetryName = (parsed: ParsedName): string =>
  (parsed.prefix ? `${parsed.prefix}-` : '') +
  parsed.base +
  formatTag(parsed.fb) +
  formatTag(parsed.lr) +
  (parsed.order ?? '');

export const symmetryKeyOf = (parsed: ParsedName): SymmetryKey => ({
  base: parsed.base,
  order: parsed.order ? Number(parsed.order.slice(1)) : null,
  lr: parsed.lr?.side ?? 0,
  fb: parsed.fb?.side ?? 0,
});

export const symmetryKey = (name: string): SymmetryKey => symmetryKeyOf(parseSymmetryName(name));

export const hasSymmetryMarkers = (key: SymmetryKey): boolean => key.lr !== 0 || key.fb !== 0;

export const sameSymmetryBase = (a: SymmetryKey, b: SymmetryKey): boolean =>
  a.base === b.base && a.order === b.order;

/**
 * Siblings share a base and are mirrored on at least one axis while the
 * other axis is equal, or mirrored on both.
 */
export const areSymmetrySiblings = (a: SymmetryKey, b: SymmetryKey): boolean => {
  if (!sameSymmetryBase(a, b)) {
    return false;
  }
  const lrFlipped = a.lr !== 0 && a.lr === -b.lr;
  const fbFlipped = a.fb !== 0 && a.fb === -b.fb;
  return (lrFlipped && a.fb === b.fb) || (fbFlipped && a.lr === b.lr) || (lrFlipped && fbFlipped);
};

const flipTag = (tag: SymmetryTag | null): SymmetryTag | null => {
  if (!tag) return null;
  const spelling = SPELLINGS[tag.axis].find((s) => s.positive === tag.text || s.negative === tag.text);
  if (!spelling) return tag;
  const side = tag.side === 1 ? -1 : 1;
  return { ...tag, side, text: side === 1 ? spelling.positive : spelling.negative };
};

export const mirrorSymmetryName = (name: string, axes: SymmetryAxis[] = ['lr']): string => {
  const parsed = parseSymmetryName(name);
  return formatSymmetryName({
    ...parsed,
    lr: axes.includes('lr') ? flipTag(parsed.lr) : parsed.lr,
    fb: axes.includes('fb') ? flipTag(parsed.fb) : parsed.fb,
  });
};

/**
 * Derives a generated bone name: swaps the role prefix and inserts the
 * suffix before the symmetry tags (`lip.L` + `_handle` -> `MCH-lip_handle.L`).
 */
export const deriveName = (name: string, kind: DerivedKind, suffix = ''): string => {
  const parsed = parseSymmetryName(name);
  return formatSymmetryName({
    ...parsed,
    prefix: PREFIX_BY_KIND[kind],
    base: parsed.base + suffix,
  });
};
