export interface Reporter {
    info(message: string): void;
    debug(message: string): void;
    error(message: string): void;
}

/**
 * Console reporter. `debug` lines only show up with --verbose.
 */
export function createConsoleReporter(verbose: boolean): Reporter {
    return {
        info: (message) => console.log(message),
        debug: (message) => {
            if (verbose) {
                console.log(message);
            }
        },
        error: (message) => console.error(message),
    };
}
