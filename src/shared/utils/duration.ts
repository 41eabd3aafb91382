const ISO_DURATION =
  /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/;
const LONG_DISPLAY = /^(\d+):([0-5]\d):([0-5]\d)$/;
const SHORT_DISPLAY = /^(\d+):([0-5]\d)$/;

const pad = (value: number) => value.toString().padStart(2, "0");

/**
 * Convert a player duration ("PT1H2M3S") into "1:02:03", or "M:SS" when
 * there is no hour part. Empty or unparsable input gives "".
 */
export function parseDuration(isoDuration: string): string {
  if (!isoDuration) return "";

  const match = ISO_DURATION.exec(isoDuration.trim());
  if (!match) return "";

  const [, days, hours, minutes, seconds] = match;
  const totalHours = Number(days ?? 0) * 24 + Number(hours ?? 0);
  const mins = Number(minutes ?? 0);
  const secs = Number(seconds ?? 0);

  if (totalHours > 0) {
    return `${totalHours}:${pad(mins)}:${pad(secs)}`;
  }
  return `${mins}:${pad(secs)}`;
}

function splitDisplay(
  display: string
): { hours: number; minutes: number; seconds: number } | null {
  const long = LONG_DISPLAY.exec(display);
  if (long) {
    return {
      hours: Number(long[1]),
      minutes: Number(long[2]),
      seconds: Number(long[3]),
    };
  }
  const short = SHORT_DISPLAY.exec(display);
  if (short) {
    return { hours: 0, minutes: Number(short[1]), seconds: Number(short[2]) };
  }
  return null;
}

/**
 * Inverse of parseDuration: "1:02:03" -> "PT1H2M3S".
 */
export function formatIsoDuration(display: string): string {
  const parts = splitDisplay(display.trim());
  if (!parts) return "";

  let result = "PT";
  if (parts.hours > 0) result += `${parts.hours}H`;
  if (parts.minutes > 0) result += `${parts.minutes}M`;
  if (parts.seconds > 0) result += `${parts.seconds}S`;
  return result === "PT" ? "PT0S" : result;
}

export function durationToSeconds(display: string | null): number | null {
  if (!display) return null;
  const parts = splitDisplay(display.trim());
  if (!parts) return null;
  return parts.hours * 3600 + parts.minutes * 60 + parts.seconds;
}
