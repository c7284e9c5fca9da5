import { describeError } from "./errors";
import { type Logger, createLogger } from "./log";
const baseLogger = createLogger(module);

export abstract class Service {
    abstract start(): Promise<void>;

    logger: Logger = baseLogger;
    setLogger(logger: Logger) {
        this.logger = logger;
    }

    abstract desc(): string;

    // Shutdown related
    abstract shutdown(): Promise<void>;
    private lastCtrlCTime: number = 0;
    private hasTerminated: boolean = false;
    get terminated() {
        return this.hasTerminated;
    }
    enableGracefulShutdown() {
        const gracefulShutdown = (signal: NodeJS.Signals) => {
            this.onShutdown(signal).catch((e: unknown) => {
                this.logger.error(
                    `${this.desc()} shutdown failed: ${describeError(e)}`,
                );
                process.exit(1);
            });
        };
        process.on("SIGINT", gracefulShutdown);
        process.on("SIGTERM", gracefulShutdown);
    }
    async onShutdown(signal: NodeJS.Signals) {
        if (this.terminated) {
            const now = new Date().getTime();
            if (now - this.lastCtrlCTime >= 1000) {
                this.logger.warn(`${this.desc()} already terminating...`);
                this.logger.warn(
                    "Press Ctrl+C again in 1 second to force termination.",
                );
                this.lastCtrlCTime = now;
                return;
            } else {
                this.logger.warn(`${this.desc()} force terminating...`);
                process.exit(1);
            }
        }
        this.hasTerminated = true;
        this.logger.info(
            `${this.desc()} received ${signal}, graceful shutdown started.`,
        );
        await this.shutdown();
        this.logger.info(`${this.desc()} graceful shutdown completed.`);
    }
}
