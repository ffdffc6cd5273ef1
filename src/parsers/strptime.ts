import { DateTime, Settings } from 'luxon';

/**
 * strftime-style time string parsing on top of luxon's `fromFormat`.
 *
 * Directives are translated to luxon tokens and literal text is quoted.
 * Units a format leaves out default to 1900-01-01 00:00:00.
 */

// Two-digit years 69-99 are 1969-1999, 00-68 are 2000-2068
Settings.twoDigitCutoffYear = 68;

const DIRECTIVE_TOKENS = new Map<string, string>([
  ['Y', 'yyyy'],
  ['y', 'yy'],
  ['m', 'M'],
  ['b', 'MMM'],
  ['B', 'MMMM'],
  ['d', 'd'],
  ['j', 'o'],
  ['H', 'H'],
  ['I', 'h'],
  ['p', 'a'],
  ['M', 'm'],
  ['S', 's'],
]);

// %z is tried as `+0100` first, then as `+01:00`
const OFFSET_TOKENS = ['ZZZ', 'ZZ'];

const PARTS_SEPARATOR = '|';

// Month names and AM/PM in data files are English
const PARSE_LOCALE = 'en-US';

export interface TranslatedFormat {
  /** Luxon formats to try, in order */
  formats: string[];
  /** The value prefix supplying defaulted units */
  defaultsPrefix: string;
  hasOffset: boolean;
}

const translatedFormats = new Map<string, TranslatedFormat | null>();

function quote(literal: string): string {
  return literal.length > 0 ? `'${literal}'` : '';
}

type FormatSegment = { token: string } | { offset: true };

/**
 * Translate a strftime format into luxon formats. Returns null for formats
 * with an unknown directive, a stray trailing `%`, or a single quote.
 */
export function translateFormat(format: string): TranslatedFormat | null {
  const cached = translatedFormats.get(format);
  if (cached !== undefined) return cached;

  const directives = new Set<string>();
  const segments: FormatSegment[] = [];
  let literal = '';
  let valid = !format.includes("'");

  const flushLiteral = (): void => {
    if (literal.length > 0) segments.push({ token: quote(literal) });
    literal = '';
  };

  for (let i = 0; valid && i < format.length; i++) {
    const char = format[i];
    if (char !== '%') {
      literal += char;
      continue;
    }

    i++;
    const directive = i < format.length ? format[i] : '';
    const token = DIRECTIVE_TOKENS.get(directive);
    if (directive === '%') {
      literal += '%';
    } else if (directive === 'z') {
      flushLiteral();
      segments.push({ offset: true });
      directives.add(directive);
    } else if (token !== undefined) {
      flushLiteral();
      segments.push({ token });
      directives.add(directive);
    } else {
      valid = false;
    }
  }
  flushLiteral();

  let translated: TranslatedFormat | null = null;
  if (valid) {
    const defaults: Array<[string, string]> = [];
    if (!directives.has('Y') && !directives.has('y')) defaults.push(['yyyy', '1900']);
    if (!directives.has('j')) {
      if (!directives.has('m') && !directives.has('b') && !directives.has('B')) defaults.push(['M', '1']);
      if (!directives.has('d')) defaults.push(['d', '1']);
    }

    const prefixFormat = defaults.map(([token]) => token + quote(PARTS_SEPARATOR)).join('');
    const render = (offsetToken: string): string =>
      prefixFormat + segments.map((segment) => ('offset' in segment ? offsetToken : segment.token)).join('');
    const hasOffset = directives.has('z');

    translated = {
      formats: hasOffset ? OFFSET_TOKENS.map(render) : [render('')],
      defaultsPrefix: defaults.map(([, value]) => value + PARTS_SEPARATOR).join(''),
      hasOffset,
    };
  }

  translatedFormats.set(format, translated);
  return translated;
}

/**
 * Parse `value` with a strftime `format`.
 *
 * Without `%z` the result holds the wall-clock time in UTC, ready to be
 * localized. With `%z` it carries the parsed offset. Returns null when the
 * value does not match or names an impossible date.
 */
export function strptime(value: string, format: string): DateTime | null {
  const translated = translateFormat(format);
  if (!translated) return null;

  const text = translated.defaultsPrefix + value;
  for (const luxonFormat of translated.formats) {
    const dt = translated.hasOffset
      ? DateTime.fromFormat(text, luxonFormat, { locale: PARSE_LOCALE, setZone: true })
      : DateTime.fromFormat(text, luxonFormat, { locale: PARSE_LOCALE, zone: 'utc' });
    if (dt.isValid) return dt;
  }
  return null;
}
