import { InvalidDurationException } from './exceptions/invalid-duration.exception';

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
};

/**
 * Converts a duration such as `10s`, `5h` or `7m30s` to a number of seconds.
 * Tokens are summed, so `1h 30m` and `30m1h` are the same duration.
 */
export function toSeconds(input: string): number {
  const token = /\s*(\d+)([a-zA-Z]?)/y;
  let duration = 0;
  let position = 0;
  let tokens = 0;

  while (position < input.length) {
    if (/^\s*$/.test(input.slice(position))) {
      break;
    }
    token.lastIndex = position;
    const match = token.exec(input);
    if (!match) {
      throw new InvalidDurationException(input, input.slice(position).trim());
    }
    const [element, digits, unit] = match;
    const magnitude = UNIT_SECONDS[unit];
    if (magnitude === undefined) {
      throw new InvalidDurationException(input, element.trim());
    }
    duration += magnitude * parseInt(digits, 10);
    position += element.length;
    tokens++;
  }

  if (tokens === 0) {
    throw new InvalidDurationException(input, '');
  }
  return duration;
}
