// This module provides the get_locale_date_time tool for resolving local wall-clock time by city or IANA zone.

import { z } from 'zod';
import { AppError } from '../../utils/errors.js';
import { defineTool, type ToolRegistryBuilder } from '../tool-registry.js';

export const LOCALE_DATE_TIME_TOOL_NAME = 'get_locale_date_time';

// Lookups are case-insensitive on the trimmed input.
const CITY_TO_TIME_ZONE: Readonly<Record<string, string>> = {
  'new york': 'America/New_York',
  nyc: 'America/New_York',
  copenhagen: 'Europe/Copenhagen',
  'cp hagen': 'Europe/Copenhagen'
};

export const localeDateTimeSchema = z
  .object({
    locale: z
      .string()
      .describe("Timezone/locale like 'America/New_York', 'Europe/Copenhagen', 'New York', or 'Copenhagen'.")
  })
  .strict();

export interface LocaleDateTimeToolOptions {
  now?: () => Date;
}

export interface ZonedDateTime {
  date: string;
  time: string;
  offset: string;
  abbreviation: string;
}

// This helper validates IANA time zone identifiers with the runtime Intl implementation.
function isValidTimeZone(value: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

// This function maps one locale string to an IANA time zone or raises a tool-level error.
export function resolveTimeZone(locale: string): string {
  const candidate = locale.trim();
  if (!candidate) {
    throw new AppError(400, 'validation_error', '`locale` is required.');
  }

  const alias = CITY_TO_TIME_ZONE[candidate.toLowerCase()];
  if (alias) {
    return alias;
  }

  if (!isValidTimeZone(candidate)) {
    throw new AppError(
      400,
      'unsupported_locale',
      "Unsupported locale/timezone. Try an IANA timezone like 'America/New_York' or a known alias like 'Copenhagen'."
    );
  }

  return candidate;
}

// This helper converts Intl "GMT+05:30" style offsets into the compact "+0530" form.
function toCompactOffset(gmtOffset: string): string {
  const match = /^GMT([+-])(\d{1,2})(?::(\d{2}))?$/.exec(gmtOffset);
  if (!match) {
    return '+0000';
  }

  const [, sign, hours, minutes] = match;
  return `${sign}${hours.padStart(2, '0')}${minutes ?? '00'}`;
}

// This function formats one instant as wall-clock parts in the given time zone.
export function formatZonedDateTime(instant: Date, timeZone: string): ZonedDateTime {
  const partsOf = (options: Intl.DateTimeFormatOptions): Map<string, string> =>
    new Map(
      new Intl.DateTimeFormat('en-US', { timeZone, ...options })
        .formatToParts(instant)
        .map((part): [string, string] => [part.type, part.value])
    );

  const wallClock = partsOf({
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  });
  const offset = toCompactOffset(partsOf({ timeZoneName: 'longOffset' }).get('timeZoneName') ?? 'GMT');
  // en-US only names some zones; the rest come back as "GMT+2" and would duplicate the numeric offset.
  const shortName = partsOf({ timeZoneName: 'short' }).get('timeZoneName') ?? '';
  const abbreviation = /^GMT[+-]/.test(shortName) ? '' : shortName;

  return {
    date: `${wallClock.get('year')}-${wallClock.get('month')}-${wallClock.get('day')}`,
    time: `${wallClock.get('hour')}:${wallClock.get('minute')}:${wallClock.get('second')}`,
    offset,
    abbreviation
  };
}

// This function registers the locale date/time tool with an injectable clock.
export function registerLocaleDateTimeTool(builder: ToolRegistryBuilder, options: LocaleDateTimeToolOptions = {}): void {
  const now = options.now ?? (() => new Date());

  builder.register(
    defineTool({
      name: LOCALE_DATE_TIME_TOOL_NAME,
      description: 'Get the local date/time for a locale. Use an IANA timezone or known city alias.',
      inputSchema: localeDateTimeSchema,
      handler: (args) => {
        const timeZone = resolveTimeZone(args.locale);
        const zoned = formatZonedDateTime(now(), timeZone);
        const isoOffset = `${zoned.offset.slice(0, 3)}:${zoned.offset.slice(3)}`;

        return {
          content: [
            {
              type: 'text',
              text: `Local date/time in ${timeZone} is ${zoned.date} ${zoned.time} ${zoned.abbreviation}${zoned.offset}.`
            }
          ],
          structuredContent: {
            locale: args.locale,
            timezone: timeZone,
            date: zoned.date,
            time: zoned.time,
            iso: `${zoned.date}T${zoned.time}${isoOffset}`,
            offset: zoned.offset
          },
          isError: false
        };
      }
    })
  );
}
