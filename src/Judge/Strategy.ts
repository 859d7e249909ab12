import { JudgeMode, Range, Signal } from "./decl";
import { JudgeInternalError } from "./errors";

export interface RangeStrategy {
    readonly mode: JudgeMode;
    respond(guess: number): Signal;
}

export class FixedAnswerStrategy implements RangeStrategy {
    readonly mode = JudgeMode.Fixed;
    constructor(readonly answer: number) {}

    respond(guess: number): Signal {
        if (guess === this.answer) {
            return Signal.Equal;
        } else if (guess < this.answer) {
            return Signal.Lower;
        } else {
            return Signal.Higher;
        }
    }
}

/**
 * Commits to no answer. Every guess inside the live interval throws away the
 * smaller side, so any value left in [low, high] explains all answers so far.
 */
export class AdaptiveAdversaryStrategy implements RangeStrategy {
    readonly mode = JudgeMode.Adaptive;
    private low: number;
    private high: number;

    constructor(initialRange: Range) {
        if (initialRange.low > initialRange.high) {
            throw new RangeError(
                `Empty range [${initialRange.low}, ${initialRange.high}]`
            );
        }
        this.low = initialRange.low;
        this.high = initialRange.high;
    }

    get range(): Readonly<Range> {
        return { low: this.low, high: this.high };
    }

    respond(guess: number): Signal {
        if (guess === this.low && guess === this.high) {
            return Signal.Equal;
        } else if (guess < this.low) {
            return Signal.Lower;
        } else if (guess > this.high) {
            return Signal.Higher;
        }
        const belowCount = guess - this.low;
        const aboveCount = this.high - guess;
        // ties shrink from the top
        if (belowCount < aboveCount) {
            this.low = guess + 1;
        } else {
            this.high = guess - 1;
        }
        if (guess < this.low) {
            return Signal.Lower;
        } else if (guess > this.high) {
            return Signal.Higher;
        }
        throw new JudgeInternalError(
            `guess ${guess} is still inside [${this.low}, ${this.high}] after narrowing`,
            guess,
            this.low,
            this.high
        );
    }
}

export type StrategyOption =
    | { mode: JudgeMode.Fixed; answer: number }
    | { mode: JudgeMode.Adaptive; initialRange: Range };

export function getConfiguredStrategy(option: StrategyOption): RangeStrategy {
    switch (option.mode) {
        case JudgeMode.Fixed:
            return new FixedAnswerStrategy(option.answer);
        case JudgeMode.Adaptive:
            return new AdaptiveAdversaryStrategy(option.initialRange);
    }
}
