/** Operator-facing log sink. `console` satisfies it; tests pass a stub. */
export type Logger = Pick<Console, 'log' | 'error'>;

export const consoleLogger: Logger = console;
