import { DateTime, FixedOffsetZone, IANAZone } from 'luxon';

const INPUT_FORMAT = "yyyy-MM-dd'T'HH:mm";

export function isEventDateTime(s: string): boolean {
  return /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}$/.test(s) && DateTime.fromFormat(s, INPUT_FORMAT, { zone: 'UTC' }).isValid;
}

/**
 * Offset in minutes of a wall-clock time (given as if it were UTC) in `zone`.
 * A local time that happens twice, or is skipped, takes the standard offset.
 */
function wallOffset(wall: DateTime, zone: string): number {
  const around = new Set([wall.minus({ days: 1 }), wall.plus({ days: 1 })].map(w => w.setZone(zone).offset));
  const fits = [...around].filter(o => DateTime.fromMillis(wall.toMillis() - o * 60_000, { zone }).offset === o);
  return fits.length === 1 ? fits[0] : Math.min(...around);
}

/**
 * Composes a wall-clock `YYYY-MM-DDTHH:MM` in `zone` with that zone's offset
 * on that date, e.g. `2023-01-01T00:00:00-0500` for America/New_York.
 * Returns null for a malformed time or unknown zone.
 */
export function composeWithZone(s: string, zone: string): string | null {
  if (!isEventDateTime(s) || !IANAZone.isValidZone(zone)) return null;
  const wall = DateTime.fromFormat(s, INPUT_FORMAT, { zone: 'UTC' });
  return `${s}:00${FixedOffsetZone.instance(wallOffset(wall, zone)).formatOffset(0, 'techie')}`;
}
