import fs from "fs";
import { isJudgeMode, JudgeMode, Range } from "./decl";
import { JudgeConfigurationError } from "./errors";

export type JudgeInput =
    | { mode: JudgeMode.Fixed; answer: number }
    | { mode: JudgeMode.Adaptive };

const IntegerToken = /^[+-]?\d+$/;

/**
 * Strict decimal integer. Anything else, including values beyond the safe
 * integer range, is undefined.
 */
export function parseInteger(token: string): number | undefined {
    if (!IntegerToken.test(token)) {
        return undefined;
    }
    const value = Number(token);
    return Number.isSafeInteger(value) ? value : undefined;
}

export function parseJudgeInput(content: string, range: Range): JudgeInput {
    const tokens = content.split(/\s+/).filter((token) => token !== "");
    const mode = tokens[0];
    if (mode === undefined) {
        throw new JudgeConfigurationError("judge input is empty");
    }
    if (!isJudgeMode(mode)) {
        throw new JudgeConfigurationError(`unknown judge mode "${mode}"`);
    }
    if (mode === JudgeMode.Adaptive) {
        return { mode };
    }
    const answerToken = tokens[1];
    if (answerToken === undefined) {
        throw new JudgeConfigurationError("fixed mode needs a secret answer");
    }
    const answer = parseInteger(answerToken);
    if (answer === undefined) {
        throw new JudgeConfigurationError(
            `secret answer "${answerToken}" is not an integer`
        );
    }
    if (answer < range.low || answer > range.high) {
        throw new JudgeConfigurationError(
            `secret answer ${answer} is outside [${range.low}, ${range.high}]`
        );
    }
    return { mode, answer };
}

export async function readJudgeInput(
    filePath: string,
    range: Range
): Promise<JudgeInput> {
    let content: string;
    try {
        content = await fs.promises.readFile(filePath, "utf-8");
    } catch (err) {
        throw new JudgeConfigurationError(
            `cannot read judge input ${filePath}: ${String(err)}`
        );
    }
    return parseJudgeInput(content, range);
}

/**
 * The reference answer carries nothing for this problem but must be there.
 */
export async function checkJudgeAnswer(filePath: string): Promise<void> {
    try {
        await fs.promises.access(filePath, fs.constants.R_OK);
    } catch (err) {
        throw new JudgeConfigurationError(
            `cannot read judge answer ${filePath}: ${String(err)}`
        );
    }
}
