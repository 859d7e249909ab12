#!/usr/bin/env node
import "reflect-metadata";
import { Command, InvalidArgumentError } from "commander";
import { Appender, configure, getLogger, shutdown } from "log4js";
import { ConfigOverride, LogConfig, loadConfig } from "./Config";
import { ExitCode } from "./Judge/decl";
import { JudgeConfigurationError, JudgeInternalError } from "./Judge/errors";
import { runJudge } from "./Judge";
import { getSelfTests, runSelfTests } from "./SelfTest";
import { parseInteger } from "./Judge/JudgeInput";

// stdout belongs to the contestant, every appender writes elsewhere
function configureLogging(log: Pick<LogConfig, "level" | "file">): void {
    const appenders: Record<string, Appender> = { stderr: { type: "stderr" } };
    if (log.file) {
        appenders.judge = {
            type: "file",
            filename: log.file,
            maxLogSize: "10M",
            backups: 5,
        };
    }
    configure({
        appenders,
        categories: {
            default: { appenders: Object.keys(appenders), level: log.level },
        },
    });
}

function integerOption(value: string): number {
    const parsed = parseInteger(value);
    if (parsed === undefined) {
        throw new InvalidArgumentError("Not an integer.");
    }
    return parsed;
}

async function exitAfterLogging(code: number): Promise<never> {
    await new Promise<void>((resolve) => shutdown(() => resolve()));
    process.exit(code);
}

async function fail(err: unknown): Promise<never> {
    const logger = getLogger("main");
    if (err instanceof JudgeInternalError) {
        logger.fatal(
            `judge inconsistency on guess ${err.guess} with range [${err.low}, ${err.high}]: ${err.message}`
        );
    } else if (err instanceof JudgeConfigurationError) {
        logger.fatal(`configuration error: ${err.message}`);
    } else {
        logger.fatal(err);
    }
    return exitAfterLogging(ExitCode.Fault);
}

interface JudgeCommandOption extends ConfigOverride {
    config?: string;
}

async function main(): Promise<void> {
    configureLogging({ level: "warn" });
    const program = new Command();
    program
        .name("range-judge")
        .description("Interactive judge for the guess-the-number problem");

    program
        .command("judge", { isDefault: true })
        .description("adjudicate one contestant over stdin/stdout")
        .argument("<judge_in>", "judge-private input: fixed <secret> | adaptive")
        .argument("<judge_ans>", "reference answer file, unused")
        .argument("<feedback_dir>", "directory receiving judgemessage.txt")
        .option("--config <file>", "TOML configuration file")
        .option("--turn-budget <n>", "maximum guesses, 0 for unbounded", integerOption)
        .option("--low <n>", "initial range lower bound", integerOption)
        .option("--high <n>", "initial range upper bound", integerOption)
        .action(
            async (
                judgeInput: string,
                judgeAnswer: string,
                feedbackDir: string,
                options: JudgeCommandOption
            ) => {
                const config = loadConfig(options.config, options);
                configureLogging(config.log);
                await runJudge(
                    { judgeInput, judgeAnswer, feedbackDir },
                    config.judge,
                    {
                        input: process.stdin,
                        output: process.stdout,
                        exit: (code) => {
                            exitAfterLogging(code).catch(() => process.exit(code));
                        },
                    }
                );
            }
        );

    program
        .command("self-test")
        .description("play the reference contestant against both modes")
        .option("--config <file>", "TOML configuration file")
        .action(async (options: { config?: string }) => {
            const config = loadConfig(options.config);
            configureLogging(config.log);
            const results = await runSelfTests(
                getSelfTests(config.judge.initialRange),
                config.selfTest.concurrency
            );
            await exitAfterLogging(results.every((result) => result.passed) ? 0 : 1);
        });

    program.exitOverride((err) => {
        // --help and --version are not faults
        if (err.exitCode === 0) {
            process.exit(0);
        }
        process.exit(ExitCode.Fault);
    });
    await program.parseAsync(process.argv);
}

main().catch(fail);
