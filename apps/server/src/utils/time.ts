const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})$/;

export function nowIso(): string {
  return new Date().toISOString();
}

export function parseRfc3339(value: string): string | null {
  const match = RFC3339.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction = "", zone = "Z"] = match;
  const millis = fraction.padEnd(3, "0").slice(0, 3);
  const normalized = `${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${zone.toUpperCase()}`;
  const ts = Date.parse(normalized);
  if (Number.isNaN(ts)) {
    return null;
  }

  const date = new Date(ts);
  // Date.parse rolls 2023-02-30 over to March; reject instead.
  const offsetMinutes = zone.toUpperCase() === "Z" ? 0 : zoneOffsetMinutes(zone);
  const local = new Date(ts + offsetMinutes * 60_000);
  if (local.getUTCDate() !== Number(day) || local.getUTCMonth() + 1 !== Number(month)) {
    return null;
  }

  return date.toISOString();
}

function zoneOffsetMinutes(zone: string): number {
  const sign = zone.startsWith("-") ? -1 : 1;
  const [hours = "0", minutes = "0"] = zone.slice(1).split(":");
  return sign * (Number(hours) * 60 + Number(minutes));
}
