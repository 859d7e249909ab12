/**
 * Raised before any interaction when arguments, files or configuration are unusable.
 */
export class JudgeConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "JudgeConfigurationError";
    }
}

/**
 * The judge contradicted itself. The run must not produce a verdict.
 */
export class JudgeInternalError extends Error {
    constructor(
        message: string,
        public readonly guess: number,
        public readonly low: number,
        public readonly high: number
    ) {
        super(message);
        this.name = "JudgeInternalError";
    }
}
