import { Readable, Writable } from "stream";
import { getLogger } from "log4js";
import { LineReader, LineWriter } from "../Utilities/Channel";
import { ExitFunction, FeedbackSink, VerdictReporter } from "../Utilities/Feedback";
import { InteractionOutcome, JudgeMode, Range, Verdict } from "./decl";
import { runInteraction } from "./Interaction";
import { checkJudgeAnswer, JudgeInput, readJudgeInput } from "./JudgeInput";
import { getConfiguredStrategy, RangeStrategy } from "./Strategy";

const logger = getLogger("RangeJudge");

export interface JudgeArgs {
    judgeInput: string;
    judgeAnswer: string;
    feedbackDir: string;
}

export interface JudgeSettings {
    turnBudget: number;
    initialRange: Range;
}

export interface JudgeIO {
    input: Readable;
    output: Writable;
    exit?: ExitFunction;
}

export function createStrategy(
    judgeInput: JudgeInput,
    initialRange: Range
): RangeStrategy {
    if (judgeInput.mode === JudgeMode.Fixed) {
        return getConfiguredStrategy(judgeInput);
    }
    return getConfiguredStrategy({ mode: JudgeMode.Adaptive, initialRange });
}

/**
 * One grading run. Configuration errors surface before the first read;
 * an internal inconsistency propagates without a verdict being reported.
 * @returns the exit status handed to the reporter
 */
export async function runJudge(
    args: JudgeArgs,
    settings: JudgeSettings,
    io: JudgeIO
): Promise<number> {
    const sink = await FeedbackSink.open(args.feedbackDir);
    const reader = new LineReader(io.input);
    const writer = new LineWriter(io.output);
    try {
        const judgeInput = await readJudgeInput(
            args.judgeInput,
            settings.initialRange
        );
        await checkJudgeAnswer(args.judgeAnswer);
        const strategy = createStrategy(judgeInput, settings.initialRange);
        logger.info(
            `mode ${strategy.mode}, range [${settings.initialRange.low}, ${
                settings.initialRange.high
            }], turn budget ${settings.turnBudget || "unbounded"}`
        );

        const outcome: InteractionOutcome = await runInteraction({
            strategy,
            reader,
            writer,
            turnBudget: settings.turnBudget,
        });
        logger.info(`finished after ${outcome.turns} turns`);

        const reporter = new VerdictReporter(sink, io.exit);
        if (outcome.verdict === Verdict.Accepted) {
            return await reporter.report(Verdict.Accepted);
        }
        return await reporter.report(Verdict.WrongAnswer, outcome.message);
    } finally {
        reader.close();
        await sink.close();
    }
}
