import { z } from 'zod';
import { InvalidParserOptionsError } from '../errors';
import { HOUR_MINUTE_TOKEN, expandHourMinute } from '../parsers/hourMinute';
import type { DeviceModel, DeviceProfile } from '../types/time';

// Configuration
export const DEFAULT_TIME_ZONE = process.env.DATALOGGER_TIME_ZONE || 'UTC';

/**
 * Time format presets for the supported datalogger models.
 *
 * CR10 and CR10X write a row's time as separate Year, Day-of-year and
 * Hour/Minute columns; CR1000 writes one `YYYY-MM-DD HH:MM:SS` column.
 */
export const DEVICE_PROFILES: Record<DeviceModel, DeviceProfile> = {
  generic: {
    model: 'generic',
    description: 'No preset; supply the time format library',
    library: [],
  },
  CR10: {
    model: 'CR10',
    description: 'Year (2 digits), Day of year, Hour/Minute',
    library: ['%y', '%j', HOUR_MINUTE_TOKEN],
    expandCustomToken: expandHourMinute,
    maxTimeValues: 3,
  },
  CR10X: {
    model: 'CR10X',
    description: 'Year (4 digits), Day of year, Hour/Minute',
    library: ['%Y', '%j', HOUR_MINUTE_TOKEN],
    expandCustomToken: expandHourMinute,
    maxTimeValues: 3,
  },
  CR1000: {
    model: 'CR1000',
    description: 'Single timestamp column',
    library: ['%Y-%m-%d %H:%M:%S'],
  },
};

export const DEVICE_MODELS = ['generic', 'CR10', 'CR10X', 'CR1000'] as const satisfies readonly DeviceModel[];

/**
 * Get a device profile by model name, or the generic profile
 */
export function getDeviceProfile(name?: string): DeviceProfile {
  const model = DEVICE_MODELS.find((known) => known.toLowerCase() === (name || 'generic').toLowerCase());
  return DEVICE_PROFILES[model || 'generic'];
}

export const DataloggerParserOptionsSchema = z.object({
  device: z.enum(DEVICE_MODELS).optional(),
  timeZone: z.string().optional(),
  timeFormatArgsLibrary: z.array(z.string()).optional(),
});

export type DataloggerParserOptions = z.infer<typeof DataloggerParserOptionsSchema>;

/**
 * Validate construction options for a datalogger parser.
 */
export function parseDataloggerParserOptions(input: unknown): DataloggerParserOptions {
  const result = DataloggerParserOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidParserOptionsError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    );
  }
  return result.data;
}
