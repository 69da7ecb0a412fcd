import { DateTime } from "luxon";

export function nowIso(): string {
    return DateTime.utc().toISO() ?? new Date().toISOString();
}

/** Renders a stored ISO timestamp in the display zone, e.g. "Oct 19, 2026 9:30 AM". */
export function formatForDisplay(iso: string, zone: string): string {
    const dt = DateTime.fromISO(iso, { zone: "utc" }).setZone(zone).setLocale("en-US");
    return dt.isValid ? dt.toFormat("LLL d, yyyy h:mm a") : iso;
}
