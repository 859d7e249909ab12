import { Range, Verdict } from "../Judge/decl";
import { JudgeInput } from "../Judge/JudgeInput";

export type ExpectedResult = {
    verdict: Verdict;
} & ({ count: true; expectedTurns: number } | { count: false; maxTurns: number });

export type SelfTest = {
    name: string;
    judgeInput: JudgeInput;
    initialRange: Range;
    turnBudget: number;
    expectedResult: ExpectedResult;
};

export type SelfTestResult = {
    name: string;
    passed: boolean;
    verdict: Verdict;
    turns: number;
    guesses: number[];
    failure?: string;
};

/**
 * Guesses binary search needs on a range of this width, confirming guess included.
 */
export function worstCaseTurns(range: Range): number {
    let turns = 0;
    for (let width = range.high - range.low + 1; width > 0; width = Math.floor(width / 2)) {
        ++turns;
    }
    return turns;
}
