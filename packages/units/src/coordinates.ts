/**
 * Coordinate formatting from decimal degrees (DD.FF).
 *
 * Both formats show the absolute whole degrees followed by the hemisphere
 * letter; `value > 0` selects E/N, anything else W/S.
 */

function hemisphere(value: number, isLongitude: boolean): string {
  if (isLongitude) {
    return value > 0 ? 'E' : 'W';
  }
  return value > 0 ? 'N' : 'S';
}

function splitDegrees(value: number): { degrees: number; fraction: number } {
  const degrees = Math.abs(Math.trunc(value));
  return { degrees, fraction: Math.abs(value) - degrees };
}

/**
 * DD.FF to `D:MM.mmm` plus hemisphere, minutes with three decimals zero-padded
 * to six characters.
 *
 * @example ddmmff(45.5, true) // '45:30.000E'
 */
export function ddmmff(value: number, isLongitude: boolean): string {
  const { degrees, fraction } = splitDegrees(value);
  const minutes = (fraction * 60).toFixed(3).padStart(6, '0');
  return `${degrees}:${minutes}${hemisphere(value, isLongitude)}`;
}

/**
 * DD.FF to `DDD:MM:SS` (longitude) or `DD:MM:SS` (latitude) plus hemisphere.
 * Minutes and seconds are truncated, not rounded.
 *
 * @example ddmmss(45.5, true) // '045:30:00E'
 */
export function ddmmss(value: number, isLongitude: boolean): string {
  const { degrees, fraction } = splitDegrees(value);
  const minutes = Math.trunc(fraction * 60);
  const seconds = Math.trunc((fraction * 60 - minutes) * 60);

  const deg = String(degrees).padStart(isLongitude ? 3 : 2, '0');
  const mm = String(minutes).padStart(2, '0');
  const ss = String(seconds).padStart(2, '0');
  return `${deg}:${mm}:${ss}${hemisphere(value, isLongitude)}`;
}
