export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const epochMillis = (clock: Clock): number => clock.now().getTime();
