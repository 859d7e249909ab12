import { getLogger } from "log4js";
import { decodeSignal, DefaultRange, Range, Signal } from "../Judge/decl";
import { LineReader, LineWriter } from "../Utilities/Channel";

const logger = getLogger("Contestant");

export interface ContestantResult {
    guesses: number[];
    signals: Signal[];
    found: boolean;
}

/**
 * Reference client: plain binary search, stops on anything but < or >.
 */
export class BinarySearchContestant {
    private low: number;
    private high: number;

    constructor(
        private readonly reader: LineReader,
        private readonly writer: LineWriter,
        range: Range = DefaultRange
    ) {
        this.low = range.low;
        this.high = range.high;
    }

    async play(): Promise<ContestantResult> {
        const guesses: number[] = [];
        const signals: Signal[] = [];
        for (;;) {
            const mid = Math.floor((this.low + this.high) / 2);
            logger.debug(`guessing ${mid}`);
            if (!(await this.writer.writeLine(String(mid)))) {
                break;
            }
            guesses.push(mid);
            const line = await this.reader.readLine();
            const signal = line === null ? undefined : decodeSignal(line);
            if (signal === undefined) {
                break;
            }
            signals.push(signal);
            if (signal === Signal.Lower) {
                this.low = mid + 1;
            } else if (signal === Signal.Higher) {
                this.high = mid - 1;
            } else {
                break;
            }
        }
        this.writer.end();
        return {
            guesses,
            signals,
            found: signals[signals.length - 1] === Signal.Equal,
        };
    }
}
