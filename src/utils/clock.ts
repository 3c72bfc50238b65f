export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, Math.max(0, ms)))
};
