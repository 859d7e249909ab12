import * as TOML from "@iarna/toml";
import { Type, plainToClass } from "class-transformer";
import {
    IsIn,
    IsInt,
    IsNotEmpty,
    IsOptional,
    IsPositive,
    IsString,
    Min,
    ValidateNested,
    validateSync,
} from "class-validator";
import fs from "fs";
import { merge } from "lodash";
import { getLogger } from "log4js";
import { DefaultRange } from "./Judge/decl";
import { JudgeConfigurationError } from "./Judge/errors";
const logger = getLogger("ConfigService");

export const LogLevels = [
    "trace",
    "debug",
    "info",
    "warn",
    "error",
    "fatal",
    "off",
];

export class RangeConfig {
    @IsInt()
    low!: number;
    @IsInt()
    high!: number;
}
export class JudgeConfig {
    @IsInt()
    @Min(0)
    turnBudget!: number;
    @ValidateNested()
    @IsNotEmpty()
    @Type(() => RangeConfig)
    initialRange!: RangeConfig;
}
export class LogConfig {
    @IsString()
    @IsIn(LogLevels)
    level!: string;
    @IsString()
    @IsNotEmpty()
    @IsOptional()
    file?: string;
}
export class SelfTestConfig {
    @IsInt()
    @IsPositive()
    concurrency!: number;
}
export class Config {
    @ValidateNested()
    @IsNotEmpty()
    @Type(() => JudgeConfig)
    judge!: JudgeConfig;
    @ValidateNested()
    @IsNotEmpty()
    @Type(() => LogConfig)
    log!: LogConfig;
    @ValidateNested()
    @IsNotEmpty()
    @Type(() => SelfTestConfig)
    selfTest!: SelfTestConfig;
}

export const DefaultConfig = {
    judge: {
        turnBudget: 0,
        initialRange: { low: DefaultRange.low, high: DefaultRange.high },
    },
    log: { level: "info" },
    selfTest: { concurrency: 4 },
};

export interface ConfigOverride {
    turnBudget?: number;
    low?: number;
    high?: number;
}

function tryValidate(
    args: object,
    padding = 0,
    prefix = ""
): boolean {
    const errs = validateSync(args, {
        whitelist: true,
        forbidNonWhitelisted: true,
    });
    if (errs.length !== 0) {
        for (const err of errs) {
            logger.fatal(
                `${"".padEnd(padding, "│ ")}│ Config check failed on property ${prefix}${err.property}`
            );
            if (err.constraints !== undefined) {
                for (const constraint in err.constraints) {
                    logger.fatal(
                        `${"".padEnd(padding, "│ ")}├ because ${constraint} failed(${
                            err.constraints[constraint]
                        })`
                    );
                }
            }
            if (typeof err.value === "object" && err.value !== null) {
                logger.fatal(
                    `${"".padEnd(padding, "│ ")}├─┬${"".padEnd(10, "─")}`
                );
                tryValidate(err.value, padding + 2, `${prefix}${err.property}.`);
            }
            logger.fatal(`${"".padEnd(padding, "│ ")}└ No more details available`);
        }
        return false;
    }
    return true;
}

function readToml(file: string): Record<string, unknown> {
    let raw: string;
    try {
        raw = fs.readFileSync(file).toString();
    } catch (err) {
        throw new JudgeConfigurationError(
            `cannot read config ${file}: ${String(err)}`
        );
    }
    try {
        return TOML.parse(raw);
    } catch (err) {
        throw new JudgeConfigurationError(
            `cannot parse config ${file}: ${String(err)}`
        );
    }
}

/**
 * Defaults, then the TOML file, then the command line.
 */
export function loadConfig(file?: string, override: ConfigOverride = {}): Config {
    logger.info(`Loading Config from ${file ?? "defaults"}`);
    const rawConfig: Record<string, unknown> = merge(
        {},
        DefaultConfig,
        file !== undefined ? readToml(file) : {},
        {
            judge: {
                turnBudget: override.turnBudget,
                initialRange: { low: override.low, high: override.high },
            },
        }
    );
    const loaded = plainToClass(Config, rawConfig);
    if (!tryValidate(loaded)) {
        throw new JudgeConfigurationError(
            "Failed to get Config, please check the config file"
        );
    }
    const { low, high } = loaded.judge.initialRange;
    if (low > high) {
        throw new JudgeConfigurationError(
            `initial range [${low}, ${high}] is empty`
        );
    }
    logger.info("Loaded Config");
    return loaded;
}
