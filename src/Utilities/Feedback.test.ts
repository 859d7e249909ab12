import * as fs from "fs/promises";
import os from "os";
import path from "path";
import { Verdict } from "../Judge/decl";
import { JudgeConfigurationError } from "../Judge/errors";
import { FeedbackSink, VerdictReporter } from "./Feedback";

describe("Feedback", () => {
    let tmpDir: string;

    beforeEach(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "range-judge-fb-"));
    });

    afterEach(async () => {
        await fs.rm(tmpDir, { recursive: true, force: true });
    });

    const messagePath = () => path.join(tmpDir, "judgemessage.txt");

    it("creates an empty judgemessage.txt on open", async () => {
        const sink = await FeedbackSink.open(tmpDir);
        await sink.close();
        await expect(fs.readFile(messagePath(), "utf8")).resolves.toBe("");
    });

    it("writes each diagnostic once on a single line", async () => {
        const sink = await FeedbackSink.open(tmpDir);
        await sink.write("exceeded maximum\nquery count of 11");
        await sink.write("exceeded maximum query count of 11");
        await sink.close();
        await expect(fs.readFile(messagePath(), "utf8")).resolves.toBe(
            "exceeded maximum query count of 11\n"
        );
    });

    it("is safe to close twice and ignores writes after close", async () => {
        const sink = await FeedbackSink.open(tmpDir);
        await sink.close();
        await sink.close();
        await sink.write("late");
        await expect(fs.readFile(messagePath(), "utf8")).resolves.toBe("");
    });

    it("fails to open under a missing directory", async () => {
        await expect(
            FeedbackSink.open(path.join(tmpDir, "missing"))
        ).rejects.toBeInstanceOf(JudgeConfigurationError);
    });

    it("reports wrong answer with its message and exit code", async () => {
        const exit = jest.fn();
        const sink = await FeedbackSink.open(tmpDir);
        const reporter = new VerdictReporter(sink, exit);
        await expect(
            reporter.report(
                Verdict.WrongAnswer,
                "failed to read a valid integer from the contestant"
            )
        ).resolves.toBe(43);
        expect(exit).toHaveBeenCalledWith(43);
        await sink.write("after the verdict");
        await expect(fs.readFile(messagePath(), "utf8")).resolves.toBe(
            "failed to read a valid integer from the contestant\n"
        );
    });

    it("reports acceptance without a message", async () => {
        const exit = jest.fn();
        const sink = await FeedbackSink.open(tmpDir);
        await new VerdictReporter(sink, exit).report(Verdict.Accepted);
        expect(exit).toHaveBeenCalledWith(42);
        await expect(fs.readFile(messagePath(), "utf8")).resolves.toBe("");
    });
});
