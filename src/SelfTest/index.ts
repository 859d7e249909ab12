import { range } from "lodash";
import { getLogger } from "log4js";
import { Range, Verdict } from "../Judge/decl";
import { Throttle } from "../Utilities/Throttle";
import { SelfTest, SelfTestResult, worstCaseTurns } from "./decl";
import { generateAdaptiveSelfTest, generateFixedSelfTest, runSelfTest } from "./util";

export function getSelfTests(initialRange: Range): SelfTest[] {
    const worst = worstCaseTurns(initialRange);
    const fixed = range(initialRange.low, initialRange.high + 1).map((answer) =>
        generateFixedSelfTest(`Fixed${answer}`, answer, initialRange, worst, {
            verdict: Verdict.Accepted,
            count: false,
            maxTurns: worst,
        })
    );
    const tests = [
        ...fixed,
        generateAdaptiveSelfTest("Adaptive", initialRange, 0, {
            verdict: Verdict.Accepted,
            count: true,
            expectedTurns: worst,
        }),
        generateAdaptiveSelfTest("AdaptiveTightBudget", initialRange, worst, {
            verdict: Verdict.Accepted,
            count: true,
            expectedTurns: worst,
        }),
    ];
    // the forced match is accepted even one guess past the budget, and a
    // budget of 0 means unbounded
    if (worst > 2) {
        tests.push(
            generateAdaptiveSelfTest("AdaptiveShortBudget", initialRange, worst - 2, {
                verdict: Verdict.WrongAnswer,
                count: true,
                expectedTurns: worst - 1,
            })
        );
    }
    return tests;
}

export async function runSelfTests(
    tests: SelfTest[],
    concurrency: number
): Promise<SelfTestResult[]> {
    const logger = getLogger("SelfTest");
    const throttle = new Throttle(concurrency);
    logger.info(`start self test, ${tests.length} cases`);
    const results = await Promise.all(
        tests.map((test) => throttle.withThrottle(() => runSelfTest(test)))
    );
    const failed = results.filter((result) => !result.passed);
    if (failed.length === 0) {
        logger.info(`self test passed, ${results.length} cases`);
    } else {
        for (const result of failed) {
            logger.error(`${result.name} failed: ${result.failure ?? ""}`);
        }
    }
    return results;
}
