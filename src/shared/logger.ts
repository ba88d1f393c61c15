export interface Logger {
    /** Progress narration, printed only with --verbose. */
    step(message: string): void;
    info(message: string): void;
    error(message: string): void;
}

export function createLogger(verbose: boolean): Logger {
    return {
        step(message) {
            if (verbose) console.log(message);
        },
        info(message) {
            console.log(message);
        },
        error(message) {
            console.error(`❌ ${message}`);
        },
    };
}
