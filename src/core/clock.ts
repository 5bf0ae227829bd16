// Clock port so checkpoint timestamps and run ids are deterministic in tests.

export type Clock = {
  now: () => Date;
  isoNow: () => string;
};

export function isoNow(): string {
  return new Date().toISOString();
}

export const systemClock: Clock = {
  now: () => new Date(),
  isoNow,
};

export function defaultRunId(date: Date = new Date()): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}Z$/, "Z");
}
