/**
 * graphql-param-client
 *
 * Scalar Codec Module
 *
 * Codecs for the built-in scalar types. Each codec pairs the GraphQL wire
 * type name with a zod schema (JSON <-> value) and with a text parser and
 * formatter. Parameter leaves use the schema to encode variables; result
 * types use it to decode responses.
 */

import * as z from 'zod';
import { InvalidInputError } from './errors.js';

/**
 * A scalar type: its wire name, JSON schema and text form.
 */
export interface ScalarCodec<S extends z.ZodType> {
  /** GraphQL type name used in variable declarations */
  readonly wireType: string;
  /** Schema decoding the JSON wire value (and encoding values back) */
  readonly schema: S;
  /** Parses the text form of a value */
  parse(text: string): z.output<S>;
  /** Formats a value as text */
  format(value: z.output<S>): string;
}

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

const MILLIS_PER_MINUTE = 60_000;
const NANOS_PER_MILLI = 1_000_000;

/** 0000-01-01T00:00:00Z */
const MIN_EPOCH_MILLIS = -62_167_219_200_000;
/** 9999-12-31T23:59:59.999Z */
const MAX_EPOCH_MILLIS = 253_402_300_799_999;

/**
 * A calendar date without time or offset, serialized as `YYYY-MM-DD`.
 */
export class CalendarDate {
  private constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number,
  ) {}

  /**
   * Creates a date from its components (month is 1-based).
   *
   * @throws {InvalidInputError} If the components do not form a valid date
   */
  static of(year: number, month: number, day: number): CalendarDate {
    const date = CalendarDate.tryOf(year, month, day);
    if (!date) {
      throw new InvalidInputError(
        `Invalid Date value: ${year}-${month}-${day}`,
        `${year}-${month}-${day}`,
      );
    }
    return date;
  }

  /**
   * Creates a date from its components, returning undefined when they do
   * not form a valid date.
   */
  static tryOf(year: number, month: number, day: number): CalendarDate | undefined {
    if (![year, month, day].every(Number.isInteger) || year < 0 || year > 9999) {
      return undefined;
    }
    const probe = new Date(0);
    probe.setUTCFullYear(year, month - 1, day);
    if (
      probe.getUTCFullYear() !== year ||
      probe.getUTCMonth() !== month - 1 ||
      probe.getUTCDate() !== day
    ) {
      return undefined;
    }
    return new CalendarDate(year, month, day);
  }

  /**
   * Parses a `YYYY-MM-DD` string.
   *
   * @throws {InvalidInputError} If the text is not a valid date
   */
  static parse(text: string): CalendarDate {
    const date = CalendarDate.tryParse(text);
    if (!date) {
      throw new InvalidInputError(`Invalid Date value: "${text}", expected YYYY-MM-DD`, text);
    }
    return date;
  }

  /**
   * Parses a `YYYY-MM-DD` string, returning undefined when it is invalid.
   */
  static tryParse(text: string): CalendarDate | undefined {
    const match = DATE_PATTERN.exec(text);
    if (!match) return undefined;
    return CalendarDate.tryOf(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  equals(other: CalendarDate): boolean {
    return this.compare(other) === 0;
  }

  compare(other: CalendarDate): number {
    return this.year - other.year || this.month - other.month || this.day - other.day;
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * An instant together with the UTC offset it was expressed in, serialized
 * as an RFC 3339 string. Precision is one nanosecond; years run from 0000
 * to 9999.
 */
export class DateTime {
  private constructor(
    /** Milliseconds since the Unix epoch */
    readonly epochMillis: number,
    /** Offset from UTC in minutes */
    readonly offsetMinutes: number,
    /** Nanoseconds past `epochMillis`, 0 to 999999 */
    readonly nanos = 0,
  ) {}

  /**
   * @throws {InvalidInputError} If the instant falls outside years 0000 to 9999
   */
  static fromUnixTimestamp(seconds: number): DateTime {
    return DateTime.fromUnixTimestampMillis(seconds * 1000);
  }

  /**
   * @throws {InvalidInputError} If the instant falls outside years 0000 to 9999
   */
  static fromUnixTimestampMillis(millis: number): DateTime {
    if (!Number.isFinite(millis) || millis < MIN_EPOCH_MILLIS || millis > MAX_EPOCH_MILLIS) {
      throw new InvalidInputError(`Timestamp out of range: ${millis}`, String(millis));
    }
    return new DateTime(Math.floor(millis), 0);
  }

  /** Midnight UTC on the given date. */
  static fromCalendarDate(year: number, month: number, day: number): DateTime {
    return DateTime.fromDate(CalendarDate.of(year, month, day));
  }

  static fromCalendarDateTime(
    year: number,
    month: number,
    day: number,
    hour: number,
    minute: number,
    second: number,
  ): DateTime {
    return DateTime.fromDate(CalendarDate.of(year, month, day), hour, minute, second);
  }

  /**
   * Combines a date with a UTC time of day.
   *
   * @throws {InvalidInputError} If the time components are out of range
   */
  static fromDate(date: CalendarDate, hour = 0, minute = 0, second = 0): DateTime {
    if (!isTimeOfDay(hour, minute, second)) {
      throw new InvalidInputError(
        `Invalid time of day: ${hour}:${minute}:${second}`,
        `${hour}:${minute}:${second}`,
      );
    }
    return new DateTime(utcMillis(date, hour, minute, second, 0), 0);
  }

  /**
   * Parses an RFC 3339 date-time.
   *
   * @throws {InvalidInputError} If the text is not a valid date-time
   */
  static parse(text: string): DateTime {
    const value = DateTime.tryParse(text);
    if (!value) {
      throw new InvalidInputError(`Invalid DateTime value: "${text}", expected RFC 3339`, text);
    }
    return value;
  }

  /**
   * Parses an RFC 3339 date-time, returning undefined when it is invalid.
   */
  static tryParse(text: string): DateTime | undefined {
    const match = DATE_TIME_PATTERN.exec(text);
    if (!match) return undefined;

    const date = CalendarDate.tryOf(Number(match[1]), Number(match[2]), Number(match[3]));
    const hour = Number(match[4]);
    const minute = Number(match[5]);
    const second = Number(match[6]);
    if (!date || !isTimeOfDay(hour, minute, second)) return undefined;

    const fraction = (match[7] ?? '').padEnd(9, '0');
    const millis = Number(fraction.slice(0, 3));
    const nanos = Number(fraction.slice(3));

    let offsetMinutes = 0;
    if (!match[8]) {
      const offsetHours = Number(match[10]);
      const offsetRest = Number(match[11]);
      if (offsetHours > 23 || offsetRest > 59) return undefined;
      offsetMinutes = (offsetHours * 60 + offsetRest) * (match[9] === '-' ? -1 : 1);
    }

    const epochMillis =
      utcMillis(date, hour, minute, second, millis) - offsetMinutes * MILLIS_PER_MINUTE;
    return new DateTime(epochMillis, offsetMinutes, nanos);
  }

  /** Whole seconds since the Unix epoch. */
  get unixTimestamp(): number {
    return Math.floor(this.epochMillis / 1000);
  }

  /** Calendar date in this value's own offset. */
  toDate(): CalendarDate {
    const local = this.local();
    return CalendarDate.of(local.getUTCFullYear(), local.getUTCMonth() + 1, local.getUTCDate());
  }

  toJSDate(): Date {
    return new Date(this.epochMillis);
  }

  /** Same instant, regardless of offset. */
  equals(other: DateTime): boolean {
    return this.compare(other) === 0;
  }

  compare(other: DateTime): number {
    return this.epochMillis - other.epochMillis || this.nanos - other.nanos;
  }

  toString(): string {
    const local = this.local();
    const date = `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1, 2)}-${pad(local.getUTCDate(), 2)}`;
    const time = `${pad(local.getUTCHours(), 2)}:${pad(local.getUTCMinutes(), 2)}:${pad(local.getUTCSeconds(), 2)}`;
    const nanos = local.getUTCMilliseconds() * NANOS_PER_MILLI + this.nanos;
    const fraction = nanos === 0 ? '' : `.${pad(nanos, 9).replace(/0+$/, '')}`;
    return `${date}T${time}${fraction}${formatOffset(this.offsetMinutes)}`;
  }

  toJSON(): string {
    return this.toString();
  }

  private local(): Date {
    return new Date(this.epochMillis + this.offsetMinutes * MILLIS_PER_MINUTE);
  }
}

/**
 * Renders an integer as a fixed-point decimal with `decimals` digits after
 * the point, e.g. `asDecimal(4212, 2)` is `"42.12"`.
 */
export function asDecimal(value: number, decimals: number): string {
  const sign = value < 0 ? '-' : '';
  const digits = String(Math.abs(Math.trunc(value)));
  if (decimals <= 0) return `${sign}${digits}`;
  if (digits.length <= decimals) {
    return `${sign}0.${digits.padStart(decimals, '0')}`;
  }
  const point = digits.length - decimals;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

// === Schemas ===

export const BooleanSchema = z.boolean();

/** 32-bit signed integer. */
export const IntSchema = z.int32();

export const FloatSchema = z.number();

export const IdSchema = z.string();

export const StringSchema = z.string();

export const DateSchema = z.codec(
  z.string().refine((text) => CalendarDate.tryParse(text) !== undefined, {
    message: 'Invalid Date value, expected YYYY-MM-DD',
  }),
  z.custom<CalendarDate>((value) => value instanceof CalendarDate, 'Expected a CalendarDate'),
  {
    decode: (text) => CalendarDate.parse(text),
    encode: (date) => date.toString(),
  },
);

export const DateTimeSchema = z.codec(
  z.string().refine((text) => DateTime.tryParse(text) !== undefined, {
    message: 'Invalid DateTime value, expected RFC 3339',
  }),
  z.custom<DateTime>((value) => value instanceof DateTime, 'Expected a DateTime'),
  {
    decode: (text) => DateTime.parse(text),
    encode: (value) => value.toString(),
  },
);

// === Codecs ===

const BooleanCodec: ScalarCodec<typeof BooleanSchema> = {
  wireType: 'Boolean',
  schema: BooleanSchema,
  parse(text) {
    if (text === 'true') return true;
    if (text === 'false') return false;
    throw new InvalidInputError(`Invalid Boolean value: "${text}"`, text);
  },
  format: (value) => String(value),
};

const IntCodec: ScalarCodec<typeof IntSchema> = {
  wireType: 'Int',
  schema: IntSchema,
  parse(text) {
    const value = Number(text);
    if (!INT_PATTERN.test(text) || !IntSchema.safeParse(value).success) {
      throw new InvalidInputError(`Invalid Int value: "${text}"`, text);
    }
    return value;
  },
  format: (value) => String(value),
};

const FloatCodec: ScalarCodec<typeof FloatSchema> = {
  wireType: 'Float',
  schema: FloatSchema,
  parse(text) {
    const value = Number(text);
    if (!FLOAT_PATTERN.test(text) || !Number.isFinite(value)) {
      throw new InvalidInputError(`Invalid Float value: "${text}"`, text);
    }
    return value;
  },
  format: (value) => String(value),
};

const IdCodec: ScalarCodec<typeof IdSchema> = {
  wireType: 'ID',
  schema: IdSchema,
  parse: (text) => text,
  format: (value) => value,
};

const StringCodec: ScalarCodec<typeof StringSchema> = {
  wireType: 'String',
  schema: StringSchema,
  parse: (text) => text,
  format: (value) => value,
};

const DateCodec: ScalarCodec<typeof DateSchema> = {
  wireType: 'Date',
  schema: DateSchema,
  parse: (text) => CalendarDate.parse(text),
  format: (value) => value.toString(),
};

const DateTimeCodec: ScalarCodec<typeof DateTimeSchema> = {
  wireType: 'DateTime',
  schema: DateTimeSchema,
  parse: (text) => DateTime.parse(text),
  format: (value) => value.toString(),
};

/**
 * The built-in scalar codecs.
 *
 * @example
 * ```typescript
 * Scalars.Int.parse('42'); // 42
 * Scalars.Date.format(CalendarDate.of(1944, 6, 6)); // '1944-06-06'
 * ```
 */
export const Scalars = {
  Boolean: BooleanCodec,
  Int: IntCodec,
  Float: FloatCodec,
  ID: IdCodec,
  String: StringCodec,
  Date: DateCodec,
  DateTime: DateTimeCodec,
} as const;

// === Internal helpers ===

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function formatOffset(offsetMinutes: number): string {
  if (offsetMinutes === 0) return 'Z';
  const sign = offsetMinutes < 0 ? '-' : '+';
  const total = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(total / 60), 2)}:${pad(total % 60, 2)}`;
}

function isTimeOfDay(hour: number, minute: number, second: number): boolean {
  return (
    Number.isInteger(hour) &&
    Number.isInteger(minute) &&
    Number.isInteger(second) &&
    hour >= 0 &&
    hour < 24 &&
    minute >= 0 &&
    minute < 60 &&
    second >= 0 &&
    second < 60
  );
}

function utcMillis(
  date: CalendarDate,
  hour: number,
  minute: number,
  second: number,
  millis: number,
): number {
  const value = new Date(0);
  value.setUTCFullYear(date.year, date.month - 1, date.day);
  value.setUTCHours(hour, minute, second, millis);
  return value.getTime();
}
