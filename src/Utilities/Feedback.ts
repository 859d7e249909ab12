import fs from "fs";
import path from "path";
import { FileHandle } from "fs/promises";
import { getLogger } from "log4js";
import { FeedbackFileName, Verdict, VerdictExitCode } from "../Judge/decl";
import { JudgeConfigurationError } from "../Judge/errors";

const logger = getLogger("Feedback");

/**
 * judgemessage.txt under the feedback directory. Open once, close once.
 */
export class FeedbackSink {
    private closed = false;
    private written = new Set<string>();

    private constructor(
        readonly filePath: string,
        private readonly handle: FileHandle
    ) {}

    static async open(feedbackDir: string): Promise<FeedbackSink> {
        const filePath = path.join(feedbackDir, FeedbackFileName);
        try {
            const handle = await fs.promises.open(filePath, "w", 0o644);
            return new FeedbackSink(filePath, handle);
        } catch (err) {
            throw new JudgeConfigurationError(
                `cannot open feedback file ${filePath}: ${String(err)}`
            );
        }
    }

    /**
     * One line per distinct message; repeats are dropped.
     */
    async write(message: string): Promise<void> {
        if (this.closed) {
            logger.warn(`dropped feedback after close: ${message}`);
            return;
        }
        const line = message.replace(/\s*\n\s*/g, " ").trim();
        if (line === "" || this.written.has(line)) {
            return;
        }
        this.written.add(line);
        await this.handle.write(`${line}\n`);
    }

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        await this.handle.sync();
        await this.handle.close();
    }
}

export type ExitFunction = (code: number) => void;

export class VerdictReporter {
    constructor(
        private readonly sink: FeedbackSink,
        private readonly exit: ExitFunction = (code) => process.exit(code)
    ) {}

    async report(verdict: Verdict, message?: string): Promise<number> {
        const code = VerdictExitCode[verdict];
        try {
            if (message !== undefined) {
                await this.sink.write(message);
            }
        } finally {
            await this.sink.close();
        }
        logger.info(
            `verdict ${verdict} (exit ${code}), feedback in ${this.sink.filePath}${
                message !== undefined ? `: ${message}` : ""
            }`
        );
        this.exit(code);
        return code;
    }
}
