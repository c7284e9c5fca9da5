import type { BridgeConfig } from "../model/config";
import { ConfigError, describeError } from "../utils/errors";
import { createLogger } from "../utils/log";
import { Service } from "../utils/service";
import { BridgeLoop, type BridgeOptions, type BridgeOutcome } from "./Bridge";

const logger = createLogger(module);

export type SupervisorOptions = Omit<BridgeOptions, "logger">;

/**
 * Runs every configured bridge side by side and waits for all of them.
 * Bridges share nothing; one ending, fatally or not, leaves the rest running.
 */
export class BridgeSupervisor extends Service {
    readonly bridges: BridgeLoop[];
    private running: Promise<BridgeOutcome>[] = [];

    constructor(configs: BridgeConfig[], options: SupervisorOptions) {
        super();
        const seen = new Set<string>();
        for (const config of configs) {
            if (seen.has(config.name)) {
                throw new ConfigError("bridges", [
                    `Duplicate bridge name "${config.name}".`,
                ]);
            }
            seen.add(config.name);
        }
        this.bridges = configs.map((config) => new BridgeLoop(config, options));
        this.setLogger(logger);
    }

    desc(): string {
        return "Bridge supervisor";
    }

    async start() {
        if (this.running.length !== 0) {
            return;
        }
        this.running = this.bridges.map((bridge) => this.launch(bridge));
        this.logger.info(`Launched ${this.bridges.length} bridge(s).`);
    }

    /** Resolves once every bridge has terminated. */
    wait(): Promise<BridgeOutcome[]> {
        return Promise.all(this.running);
    }

    async shutdown() {
        for (const bridge of this.bridges) {
            bridge.stop();
        }
        await this.wait();
    }

    private async launch(bridge: BridgeLoop): Promise<BridgeOutcome> {
        let outcome: BridgeOutcome;
        try {
            outcome = await bridge.run();
        } catch (e: unknown) {
            const error = e instanceof Error ? e : new Error(String(e));
            outcome = { name: bridge.name, state: "fatal", error };
        }
        if (outcome.state === "fatal") {
            this.logger.error(
                `Bridge "${outcome.name}" terminated: ${describeError(outcome.error)}`,
            );
        } else {
            this.logger.info(`Bridge "${outcome.name}" finished.`);
        }
        return outcome;
    }
}
