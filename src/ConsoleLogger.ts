import { ILogger } from "./interfaces/ILogger";
import { describeError } from "./errors";

export class ConsoleLogger implements ILogger {
    log(message: string): void {
        console.log(message);
    }

    warn(message: string, error?: unknown): void {
        if (error !== undefined) {
            console.warn(message, describeError(error));
        } else {
            console.warn(message);
        }
    }

    error(message: string, error?: unknown): void {
        if (error !== undefined) {
            console.error(message, describeError(error));
        } else {
            console.error(message);
        }
    }
}
