export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * 24 * 60 * 60_000);
}

export function isAfter(iso: string | null, date: Date): boolean {
  return iso !== null && Date.parse(iso) > date.getTime();
}

export function secondsUntil(iso: string, from: Date): number {
  return Math.max(0, Math.ceil((Date.parse(iso) - from.getTime()) / 1000));
}
