export const DAEMON_CLOCK = "DAEMON_CLOCK";

/** Epoch milliseconds. */
export type Clock = () => number;
