export interface Logger {
    log(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

export const consoleLogger: Logger = console;

export const silentLogger: Logger = {
    log: () => {},
    error: () => {},
};
