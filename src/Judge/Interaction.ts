import { getLogger } from "log4js";
import { LineReader, LineWriter } from "../Utilities/Channel";
import {
    InteractionOutcome,
    Signal,
    Verdict,
    WrongAnswerReason,
} from "./decl";
import { parseInteger } from "./JudgeInput";
import { RangeStrategy } from "./Strategy";

const logger = getLogger("Interaction");

export const MalformedGuessMessage =
    "failed to read a valid integer from the contestant";

export function exceededMessage(turnBudget: number): string {
    return `exceeded maximum query count of ${turnBudget}`;
}

export interface InteractionOption {
    strategy: RangeStrategy;
    reader: LineReader;
    writer: LineWriter;
    turnBudget: number; // 0 = unbounded
}

/**
 * Skips blank lines. Resolves undefined on a bad token, null on end of input.
 */
async function readGuess(
    reader: LineReader
): Promise<number | undefined | null> {
    for (;;) {
        const line = await reader.readLine();
        if (line === null) {
            return null;
        }
        const token = line.trim();
        if (token === "") {
            continue;
        }
        const guess = parseInteger(token);
        if (guess === undefined) {
            logger.debug(`malformed guess "${token.slice(0, 32)}"`);
        }
        return guess;
    }
}

export async function runInteraction({
    strategy,
    reader,
    writer,
    turnBudget,
}: InteractionOption): Promise<InteractionOutcome> {
    let turns = 0;
    for (;;) {
        const guess = await readGuess(reader);
        if (guess === undefined || guess === null) {
            if (guess === null) {
                logger.debug("contestant channel closed");
            }
            return {
                verdict: Verdict.WrongAnswer,
                turns,
                reason: WrongAnswerReason.Malformed,
                message: MalformedGuessMessage,
            };
        }
        ++turns;
        const signal = strategy.respond(guess);
        logger.debug(`turn ${turns}: received guess ${guess}, ${signal}`);
        if (signal === Signal.Equal) {
            await writer.send(Signal.Equal);
            return { verdict: Verdict.Accepted, turns };
        }
        // a miss past the budget is answered with Exceeded instead
        if (turnBudget > 0 && turns > turnBudget) {
            if (writer.writable) {
                await writer.send(Signal.Exceeded);
            }
            return {
                verdict: Verdict.WrongAnswer,
                turns,
                reason: WrongAnswerReason.Exceeded,
                message: exceededMessage(turnBudget),
            };
        }
        if (!(await writer.send(signal))) {
            // contestant gone, the next read ends the run
            logger.debug(`could not deliver ${signal} on turn ${turns}`);
        }
    }
}
