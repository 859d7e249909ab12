import { PassThrough } from "stream";
import { getLogger } from "log4js";
import { InteractionOutcome, JudgeMode, Range } from "../Judge/decl";
import { createStrategy } from "../Judge";
import { runInteraction } from "../Judge/Interaction";
import { LineReader, LineWriter } from "../Utilities/Channel";
import { BinarySearchContestant, ContestantResult } from "./Contestant";
import { ExpectedResult, SelfTest, SelfTestResult } from "./decl";

const logger = getLogger("SelfTest");

export function generateFixedSelfTest(
    name: string,
    answer: number,
    initialRange: Range,
    turnBudget: number,
    expectedResult: ExpectedResult
): SelfTest {
    return {
        name,
        judgeInput: { mode: JudgeMode.Fixed, answer },
        initialRange,
        turnBudget,
        expectedResult,
    };
}

export function generateAdaptiveSelfTest(
    name: string,
    initialRange: Range,
    turnBudget: number,
    expectedResult: ExpectedResult
): SelfTest {
    return {
        name,
        judgeInput: { mode: JudgeMode.Adaptive },
        initialRange,
        turnBudget,
        expectedResult,
    };
}

/**
 * Judge and reference contestant wired back to back over in-memory pipes.
 */
export async function playSelfTest(
    test: SelfTest
): Promise<[InteractionOutcome, ContestantResult]> {
    const toJudge = new PassThrough();
    const toContestant = new PassThrough();
    const judgeReader = new LineReader(toJudge);
    const judgeWriter = new LineWriter(toContestant);
    const contestant = new BinarySearchContestant(
        new LineReader(toContestant),
        new LineWriter(toJudge),
        test.initialRange
    );
    const judging = runInteraction({
        strategy: createStrategy(test.judgeInput, test.initialRange),
        reader: judgeReader,
        writer: judgeWriter,
        turnBudget: test.turnBudget,
    }).finally(() => {
        judgeReader.close();
        judgeWriter.end();
    });
    return Promise.all([judging, contestant.play()]);
}

function explainMismatch(
    expected: ExpectedResult,
    outcome: InteractionOutcome
): string | undefined {
    if (outcome.verdict !== expected.verdict) {
        return `verdict ${outcome.verdict}, expected ${expected.verdict}`;
    }
    if (expected.count && outcome.turns !== expected.expectedTurns) {
        return `${outcome.turns} turns, expected ${expected.expectedTurns}`;
    }
    if (!expected.count && outcome.turns > expected.maxTurns) {
        return `${outcome.turns} turns, expected at most ${expected.maxTurns}`;
    }
    return undefined;
}

export async function runSelfTest(test: SelfTest): Promise<SelfTestResult> {
    const [outcome, contestant] = await playSelfTest(test);
    const failure = explainMismatch(test.expectedResult, outcome);
    if (failure !== undefined) {
        logger.warn(`${test.name}: ${failure}`);
    } else {
        logger.debug(`${test.name}: ${outcome.verdict} in ${outcome.turns}`);
    }
    return {
        name: test.name,
        passed: failure === undefined,
        verdict: outcome.verdict,
        turns: outcome.turns,
        guesses: contestant.guesses,
        failure,
    };
}
