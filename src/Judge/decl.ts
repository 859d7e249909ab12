export enum JudgeMode {
    Fixed = "fixed",
    Adaptive = "adaptive",
}
export const JudgeModeArray = [JudgeMode.Fixed, JudgeMode.Adaptive];

export enum Signal {
    Equal = "Equal",
    Lower = "Lower", // guess < answer
    Higher = "Higher", // guess > answer
    Exceeded = "Exceeded",
}

export enum Verdict {
    Accepted = "accepted",
    WrongAnswer = "wrong-answer",
}

export enum WrongAnswerReason {
    Exceeded = "exceeded",
    Malformed = "malformed",
}

export interface Range {
    low: number;
    high: number;
}

export const DefaultRange: Readonly<Range> = { low: 1, high: 1024 };

// ICPC output validator convention
export const ExitCode = {
    Accepted: 42,
    WrongAnswer: 43,
    Fault: 1,
} as const;

export const VerdictExitCode: Record<Verdict, number> = {
    [Verdict.Accepted]: ExitCode.Accepted,
    [Verdict.WrongAnswer]: ExitCode.WrongAnswer,
};

export const FeedbackFileName = "judgemessage.txt";

export type InteractionOutcome =
    | { verdict: Verdict.Accepted; turns: number }
    | {
          verdict: Verdict.WrongAnswer;
          turns: number;
          reason: WrongAnswerReason;
          message: string;
      };

/**
 * Wire table, the only place where a Signal meets its character.
 */
const SignalTable: ReadonlyArray<readonly [Signal, string]> = [
    [Signal.Equal, "="],
    [Signal.Lower, "<"],
    [Signal.Higher, ">"],
    [Signal.Exceeded, "-"],
];

const signalToChar = new Map<Signal, string>(SignalTable);
const charToSignal = new Map<string, Signal>(
    SignalTable.map(([signal, char]) => [char, signal])
);

export function encodeSignal(signal: Signal): string {
    const char = signalToChar.get(signal);
    if (char === undefined) {
        throw new Error(`Unknown signal ${signal}`);
    }
    return char;
}

/**
 * @returns undefined when the token is not one of the four signal characters
 */
export function decodeSignal(token: string): Signal | undefined {
    return charToSignal.get(token.trim());
}

export function isJudgeMode(token: string): token is JudgeMode {
    return JudgeModeArray.some((mode) => mode === token);
}
