export const MS_PER_SECOND = 1000;

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * MS_PER_SECOND);
}

export function msBetween(from: Date, to: Date): number {
  return to.getTime() - from.getTime();
}

export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}
