export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function timestamp(clock: Clock): string {
  return clock().toISOString();
}
