import { EventEmitter } from "node:events";
import type { Options } from "amqplib";
import * as winston from "winston";
import type { BrokerConnection, BrokerConnector } from "../src/broker/publisher";
import type {
    AmqpChannel,
    AmqpConnect,
    AmqpConnection,
} from "../src/broker/rabbitmq";
import type { BridgeConfig } from "../src/model/config";
import type { Notification, ParsedMessage } from "../src/model/notification";
import type {
    ListenClient,
    Subscription,
    SubscriptionFactory,
} from "../src/postgres/subscription";
import { ConnectError, PublishError } from "../src/utils/errors";
import type { Logger } from "../src/utils/log";

export function testLogger(): Logger {
    return winston.createLogger({
        level: "debug",
        transports: [new winston.transports.Console({ silent: true })],
    });
}

export const sleep = (ms: number) =>
    new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function waitFor(
    predicate: () => boolean,
    timeoutMs: number = 2000,
) {
    const deadline = Date.now() + timeoutMs;
    while (!predicate()) {
        if (Date.now() > deadline) {
            throw new Error("Condition not met in time.");
        }
        await sleep(5);
    }
}

export function makeConfig(
    name: string,
    overrides: { exchange?: string; queue?: string; dbHost?: string } = {},
): BridgeConfig {
    return {
        name,
        rabbitmq: {
            host: "localhost",
            port: 5672,
            vhost: "/",
            exchange: overrides.exchange ?? "ex1",
            exchangeType: "direct",
            username: "guest",
            password: "test-secret",
            ...(overrides.queue === undefined ? {} : { queue: overrides.queue }),
        },
        postgres: {
            host: overrides.dbHost ?? "localhost",
            port: 5432,
            database: "app",
            channel: "events",
            username: "app",
            password: "test-secret",
        },
    };
}

/** A subscription whose notifications are pushed by the test. */
export class FakeSubscription implements Subscription {
    connected = false;
    subscribed = false;
    closed = false;
    waits = 0;
    private buffer: Notification[] = [];
    private wake: ((active: boolean) => void) | null = null;
    private failWith: Error | null = null;

    constructor(
        private readonly failures: {
            connect?: Error;
            subscribe?: Error;
        } = {},
    ) {}

    async connect() {
        if (this.failures.connect) {
            throw this.failures.connect;
        }
        this.connected = true;
    }

    async subscribe() {
        if (this.failures.subscribe) {
            throw this.failures.subscribe;
        }
        this.subscribed = true;
    }

    /** Deliver payloads as one batch, as if they arrived together. */
    push(...payloads: string[]) {
        for (const payload of payloads) {
            this.buffer.push({ payload });
        }
        this.wake?.(true);
    }

    /** Signal activity without any notification. */
    poke() {
        this.wake?.(true);
    }

    loseConnection(error: Error) {
        this.failWith = error;
        this.wake?.(false);
    }

    waitForActivity(timeoutSeconds: number): Promise<boolean> {
        this.waits += 1;
        if (this.failWith) {
            return Promise.reject(this.failWith);
        }
        if (this.buffer.length !== 0) {
            return Promise.resolve(true);
        }
        return new Promise<boolean>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.wake = null;
                resolve(false);
            }, timeoutSeconds * 1000);
            this.wake = (active) => {
                clearTimeout(timer);
                this.wake = null;
                if (this.failWith) {
                    reject(this.failWith);
                } else {
                    resolve(active);
                }
            };
        });
    }

    drain(): Notification[] {
        const drained = this.buffer;
        this.buffer = [];
        return drained;
    }

    async close() {
        this.closed = true;
        this.wake?.(false);
    }
}

export function fakeSubscriptions(
    byHost: Record<string, FakeSubscription>,
): SubscriptionFactory {
    return (config) => {
        const subscription = byHost[config.host];
        if (!subscription) {
            throw new Error(`No fake subscription for ${config.host}`);
        }
        return subscription;
    };
}

export class FakeBrokerConnection implements BrokerConnection {
    published: ParsedMessage[] = [];
    closed = false;
    constructor(private readonly broker: FakeBroker) {}
    async publish(message: ParsedMessage) {
        if (this.closed) {
            throw new PublishError("connection closed");
        }
        if (this.broker.failingBodies.has(message.body)) {
            throw new PublishError("broker rejected the message");
        }
        this.published.push(message);
        this.broker.published.push(message);
    }
    async close() {
        this.closed = true;
    }
}

/** Records every connection it hands out and every message published. */
export class FakeBroker {
    connections: FakeBrokerConnection[] = [];
    published: ParsedMessage[] = [];
    failingBodies = new Set<string>();
    unreachable = false;

    connector: BrokerConnector = async () => {
        if (this.unreachable) {
            throw new ConnectError("rabbitmq", new Error("ECONNREFUSED"));
        }
        const connection = new FakeBrokerConnection(this);
        this.connections.push(connection);
        return connection;
    };
}

/** In-process stand-in for `pg.Client`. */
export class FakeListenClient extends EventEmitter implements ListenClient {
    queries: string[] = [];
    ended = false;
    constructor(
        private readonly failures: { connect?: Error; query?: Error } = {},
    ) {
        super();
    }
    async connect() {
        if (this.failures.connect) {
            throw this.failures.connect;
        }
    }
    async query(text: string) {
        if (this.failures.query) {
            throw this.failures.query;
        }
        this.queries.push(text);
        return { rows: [] };
    }
    async end() {
        this.ended = true;
        this.emit("end");
    }
    escapeIdentifier(str: string) {
        return `"${str.replace(/"/g, '""')}"`;
    }
    notify(channel: string, payload?: string) {
        this.emit("notification", { processId: 1, channel, payload });
    }
}

class FakeAmqpChannel extends EventEmitter implements AmqpChannel {
    constructor(
        private readonly log: string[],
        private readonly failOn: string | null,
        private readonly closeOn: string | null,
    ) {
        super();
    }
    private record(entry: string) {
        if (this.failOn !== null && entry.startsWith(this.failOn)) {
            throw new Error(`${this.failOn} failed`);
        }
        if (this.closeOn !== null && entry.startsWith(this.closeOn)) {
            // What amqplib does when the broker closes the channel.
            const error = new Error(
                "Channel closed by server: 406 (PRECONDITION-FAILED)",
            );
            this.emit("error", error);
            throw error;
        }
        this.log.push(entry);
    }
    async assertExchange(exchange: string, type: string) {
        this.record(`assertExchange ${exchange} ${type}`);
        return { exchange };
    }
    async assertQueue(queue: string) {
        this.record(`assertQueue ${queue}`);
        return { queue, messageCount: 0, consumerCount: 0 };
    }
    publish(exchange: string, routingKey: string, content: Buffer) {
        this.record(`publish ${exchange} ${routingKey} ${content.toString()}`);
        return true;
    }
    async close() {
        this.log.push("channel.close");
    }
}

export class FakeAmqpConnection extends EventEmitter implements AmqpConnection {
    log: string[] = [];
    closed = false;
    /** Operation prefix that should throw, e.g. "assertQueue". */
    failOn: string | null = null;
    /** Operation prefix on which the broker closes the next channel. */
    closeChannelOn: string | null = null;
    async createChannel() {
        if (this.closed) {
            throw new Error("Connection closed");
        }
        const channel = new FakeAmqpChannel(
            this.log,
            this.failOn,
            this.closeChannelOn,
        );
        this.closeChannelOn = null;
        return channel;
    }
    async close() {
        this.closed = true;
        this.log.push("connection.close");
    }
}

/** Stand-in for `amqplib.connect`. */
export class FakeAmqp {
    options: Options.Connect[] = [];
    connections: FakeAmqpConnection[] = [];
    refuse = false;
    connect: AmqpConnect = async (options) => {
        this.options.push(options);
        if (this.refuse) {
            throw new Error("ECONNREFUSED");
        }
        const connection = new FakeAmqpConnection();
        this.connections.push(connection);
        return connection;
    };
}
