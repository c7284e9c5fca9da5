import {
    type BrokerConnection,
    type BrokerConnector,
    republish,
} from "../broker/publisher";
import { connectRabbitMQ } from "../broker/rabbitmq";
import type { BridgeConfig } from "../model/config";
import type { Notification } from "../model/notification";
import {
    type Subscription,
    type SubscriptionFactory,
    createPgSubscription,
} from "../postgres/subscription";
import { describeError } from "../utils/errors";
import { type HasLogger, type Logger, bridgeLogger } from "../utils/log";
import { parsePayload } from "./payload";

export const POLL_TIMEOUT_SECONDS = 2;

export type BridgeState =
    | "starting"
    | "listening"
    | "draining"
    | "fatal"
    | "stopped";

export type BridgeOutcome =
    | { name: string; state: "fatal"; error: Error }
    | { name: string; state: "stopped" };

export interface BridgeDependencies {
    openSubscription: SubscriptionFactory;
    connectBroker: BrokerConnector;
}

export interface BridgeOptions extends Partial<BridgeDependencies> {
    /** Hold one broker connection for the bridge's lifetime. */
    persistent: boolean;
    pollTimeoutSeconds?: number;
    logger?: Logger;
}

export interface BridgeStats {
    received: number;
    published: number;
    discarded: number;
}

/**
 * Moves notifications from one PostgreSQL channel to one RabbitMQ exchange.
 *
 * `run()` keeps going until a fatal error or `stop()`. Malformed payloads and
 * failed publishes only drop the message at hand.
 */
export class BridgeLoop implements HasLogger {
    readonly name: string;
    logger: Logger;
    state: BridgeState = "starting";
    readonly stats: BridgeStats = { received: 0, published: 0, discarded: 0 };

    private readonly persistent: boolean;
    private readonly pollTimeoutSeconds: number;
    private readonly openSubscription: SubscriptionFactory;
    private readonly connectBroker: BrokerConnector;
    private subscription: Subscription | null = null;
    private broker: BrokerConnection | null = null;
    private stopping = false;

    constructor(
        private readonly config: BridgeConfig,
        options: BridgeOptions,
    ) {
        this.name = config.name;
        this.persistent = options.persistent;
        this.pollTimeoutSeconds =
            options.pollTimeoutSeconds ?? POLL_TIMEOUT_SECONDS;
        this.openSubscription =
            options.openSubscription ?? createPgSubscription;
        this.connectBroker = options.connectBroker ?? connectRabbitMQ;
        this.logger = options.logger ?? bridgeLogger(config.name);
    }

    async run(): Promise<BridgeOutcome> {
        this.logger.info(`Initiating bridge "${this.name}".`);
        try {
            await this.start();
            await this.poll();
        } catch (e: unknown) {
            const error = e instanceof Error ? e : new Error(String(e));
            this.state = "fatal";
            this.logger.error(error.message);
            if (error.cause !== undefined) {
                this.logger.error(`Cause: ${describeError(error.cause)}`);
            }
            this.logger.error("Unable to continue; bridge exiting.");
            await this.release();
            return { name: this.name, state: "fatal", error };
        }
        await this.release();
        this.state = "stopped";
        this.logger.info(`Bridge "${this.name}" stopped.`);
        return { name: this.name, state: "stopped" };
    }

    /** Ask the loop to finish after the current wait or drain. */
    stop() {
        this.stopping = true;
    }

    private async start() {
        if (this.persistent) {
            this.broker = await this.connectBroker(
                this.config.rabbitmq,
                this.logger,
            );
        }
        const subscription = this.openSubscription(
            this.config.postgres,
            this.logger,
        );
        this.subscription = subscription;
        await subscription.connect();
        await subscription.subscribe();
    }

    private async poll() {
        const subscription = this.subscription;
        if (!subscription) {
            throw new Error("Bridge polled before it was started.");
        }
        this.state = "listening";
        this.logger.info("Beginning polling for messages.");
        while (!this.stopping) {
            const active = await subscription.waitForActivity(
                this.pollTimeoutSeconds,
            );
            if (!active) {
                this.logger.debug("Timed out while polling. (this is normal)");
                continue;
            }
            this.state = "draining";
            for (const notification of subscription.drain()) {
                await this.dispatch(notification);
            }
            this.state = "listening";
        }
    }

    private async dispatch(notification: Notification) {
        this.stats.received += 1;
        const parsed = parsePayload(notification.payload);
        if (!parsed.ok) {
            this.stats.discarded += 1;
            this.logger.warn(
                `Improperly formatted message received; discarding. Message content: ${notification.payload}`,
            );
            return;
        }
        const published = await republish(
            this.broker,
            parsed.message,
            notification.payload,
            {
                bridge: this.name,
                config: this.config.rabbitmq,
                connect: this.connectBroker,
                logger: this.logger,
            },
        );
        if (published) {
            this.stats.published += 1;
        } else {
            this.stats.discarded += 1;
        }
    }

    private async release() {
        const subscription = this.subscription;
        const broker = this.broker;
        this.subscription = null;
        this.broker = null;
        if (subscription) {
            try {
                await subscription.close();
            } catch (e: unknown) {
                this.logger.warn(
                    `Error closing PostgreSQL connection: ${describeError(e)}`,
                );
            }
        }
        if (broker) {
            try {
                await broker.close();
            } catch (e: unknown) {
                this.logger.warn(
                    `Error closing RabbitMQ connection: ${describeError(e)}`,
                );
            }
        }
    }
}
