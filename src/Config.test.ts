import * as fs from "fs/promises";
import os from "os";
import path from "path";
import { loadConfig } from "./Config";
import { JudgeConfigurationError } from "./Judge/errors";

describe("loadConfig", () => {
    let tmpDir: string;

    beforeEach(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "range-judge-cfg-"));
    });

    afterEach(async () => {
        await fs.rm(tmpDir, { recursive: true, force: true });
    });

    async function writeToml(content: string): Promise<string> {
        const file = path.join(tmpDir, "judge.toml");
        await fs.writeFile(file, content);
        return file;
    }

    it("falls back to the defaults", () => {
        const config = loadConfig();
        expect(config.judge.turnBudget).toBe(0);
        expect(config.judge.initialRange).toEqual({ low: 1, high: 1024 });
        expect(config.log.level).toBe("info");
        expect(config.log.file).toBeUndefined();
        expect(config.selfTest.concurrency).toBe(4);
    });

    it("reads the TOML file over the defaults", async () => {
        const file = await writeToml(
            [
                "[judge]",
                "turnBudget = 11",
                "[judge.initialRange]",
                "low = 1",
                "high = 100",
                "[log]",
                'level = "debug"',
                'file = "judge.log"',
            ].join("\n")
        );
        const config = loadConfig(file);
        expect(config.judge.turnBudget).toBe(11);
        expect(config.judge.initialRange).toEqual({ low: 1, high: 100 });
        expect(config.log).toEqual({ level: "debug", file: "judge.log" });
        expect(config.selfTest.concurrency).toBe(4);
    });

    it("lets command line values win over the file", async () => {
        const file = await writeToml("[judge]\nturnBudget = 11\n");
        const config = loadConfig(file, { turnBudget: 20, high: 2048 });
        expect(config.judge.turnBudget).toBe(20);
        expect(config.judge.initialRange).toEqual({ low: 1, high: 2048 });
    });

    it("rejects a negative budget", () => {
        expect(() => loadConfig(undefined, { turnBudget: -1 })).toThrow(
            JudgeConfigurationError
        );
    });

    it("rejects unknown keys", async () => {
        const file = await writeToml("[judge]\nbudget = 11\n");
        expect(() => loadConfig(file)).toThrow(JudgeConfigurationError);
    });

    it("rejects an unknown log level", async () => {
        const file = await writeToml('[log]\nlevel = "loud"\n');
        expect(() => loadConfig(file)).toThrow(JudgeConfigurationError);
    });

    it("rejects an empty initial range", () => {
        expect(() => loadConfig(undefined, { low: 10, high: 5 })).toThrow(
            "initial range [10, 5] is empty"
        );
    });

    it("rejects files it cannot read or parse", async () => {
        expect(() => loadConfig(path.join(tmpDir, "missing.toml"))).toThrow(
            JudgeConfigurationError
        );
        const file = await writeToml("[judge\n");
        expect(() => loadConfig(file)).toThrow(JudgeConfigurationError);
    });
});
