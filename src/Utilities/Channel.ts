import { Readable, Writable } from "stream";
import { getLogger } from "log4js";
import { encodeSignal, Signal } from "../Judge/decl";

const logger = getLogger("Channel");

// far beyond any integer token; longer lines are cut here
export const MaxLineLength = 4096;

/**
 * Hands out one line per call. Resolves null once the stream has ended,
 * closed or failed and every buffered line has been taken.
 */
export class LineReader {
    private partial = "";
    private lines: string[] = [];
    private waiting: ((line: string | null) => void)[] = [];
    private finished = false;
    private discarding = false;

    constructor(private readonly input: Readable) {
        input.setEncoding("utf-8");
        input.on("data", (chunk: string) => this.push(chunk));
        input.on("end", () => this.finish());
        input.on("close", () => this.finish());
        input.on("error", (err) => {
            logger.warn(`read side failed: ${String(err)}`);
            this.finish();
        });
    }

    readLine(): Promise<string | null> {
        const line = this.lines.shift();
        if (line !== undefined) {
            return Promise.resolve(line);
        }
        if (this.finished) {
            return Promise.resolve(null);
        }
        this.input.resume();
        return new Promise<string | null>((resolve) =>
            this.waiting.push(resolve)
        );
    }

    /**
     * Stop consuming. Lines already buffered are dropped.
     */
    close(): void {
        this.lines = [];
        this.finish();
        this.input.pause();
    }

    private push(chunk: string): void {
        const parts = chunk.split("\n");
        const rest = parts.pop() ?? "";
        for (const part of parts) {
            this.append(part);
            if (this.discarding) {
                this.discarding = false;
            } else {
                this.deliver(this.partial.replace(/\r$/, ""));
            }
            this.partial = "";
        }
        this.append(rest);
        if (this.lines.length !== 0) {
            this.input.pause();
        }
    }

    /**
     * An overlong line is delivered cut at MaxLineLength and the rest of it
     * dropped up to the next newline.
     */
    private append(text: string): void {
        if (this.discarding) {
            return;
        }
        this.partial += text;
        if (this.partial.length > MaxLineLength) {
            logger.debug(`line longer than ${MaxLineLength} characters cut`);
            this.deliver(this.partial.slice(0, MaxLineLength));
            this.partial = "";
            this.discarding = true;
        }
    }

    private deliver(line: string): void {
        const resolve = this.waiting.shift();
        if (resolve !== undefined) {
            resolve(line);
        } else {
            this.lines.push(line);
        }
    }

    private finish(): void {
        if (this.finished) {
            return;
        }
        if (this.partial !== "") {
            this.deliver(this.partial.replace(/\r$/, ""));
            this.partial = "";
        }
        this.finished = true;
        for (const resolve of this.waiting.splice(0)) {
            resolve(null);
        }
    }
}

export class LineWriter {
    private broken = false;

    constructor(private readonly output: Writable) {
        output.on("error", (err) => {
            // EPIPE once the peer is gone
            logger.warn(`write side failed: ${String(err)}`);
            this.broken = true;
        });
    }

    get writable(): boolean {
        return !this.broken && this.output.writable;
    }

    /**
     * Resolves once the line has been handed to the stream.
     * @returns false when the channel could not take it
     */
    writeLine(line: string): Promise<boolean> {
        if (!this.writable) {
            return Promise.resolve(false);
        }
        return new Promise<boolean>((resolve) => {
            this.output.write(`${line}\n`, (err) => {
                if (err) {
                    this.broken = true;
                    resolve(false);
                } else {
                    resolve(true);
                }
            });
        });
    }

    send(signal: Signal): Promise<boolean> {
        return this.writeLine(encodeSignal(signal));
    }

    end(): void {
        if (this.output.writable) {
            this.output.end();
        }
    }
}
