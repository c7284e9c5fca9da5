import { Client, type ClientConfig } from "pg";
import type { PostgresConfig } from "../model/config";
import type { Notification } from "../model/notification";
import {
    ConnectError,
    ConnectionLostError,
    SubscribeError,
} from "../utils/errors";
import type { Logger } from "../utils/log";

/** Message emitted by a `pg` client for every NOTIFY it receives. */
export interface PgNotification {
    processId: number;
    channel: string;
    payload?: string;
}

/** The part of `pg.Client` a subscription needs. */
export interface ListenClient {
    connect(): Promise<void>;
    query(text: string): Promise<unknown>;
    end(): Promise<void>;
    escapeIdentifier(str: string): string;
    on(event: "notification", listener: (msg: PgNotification) => void): unknown;
    on(event: "error", listener: (err: Error) => void): unknown;
    on(event: "end", listener: () => void): unknown;
}

export type ListenClientFactory = (config: ClientConfig) => ListenClient;

/**
 * A database connection holding a single channel subscription.
 */
export interface Subscription {
    connect(): Promise<void>;
    subscribe(): Promise<void>;
    waitForActivity(timeoutSeconds: number): Promise<boolean>;
    drain(): Notification[];
    close(): Promise<void>;
}

export type SubscriptionFactory = (
    config: Readonly<PostgresConfig>,
    logger: Logger,
) => Subscription;

interface Waiter {
    settle(active: boolean): void;
    fail(error: ConnectionLostError): void;
}

const defaultClientFactory: ListenClientFactory = (config) =>
    new Client(config);

/**
 * LISTEN on one channel over a dedicated `pg` connection.
 *
 * `pg` never opens a transaction on its own, so the session is in autocommit
 * mode and notifications arrive as soon as the notifying transaction commits.
 * They are buffered in arrival order until the next `drain()`.
 */
export class PgSubscription implements Subscription {
    private client: ListenClient;
    private buffer: Notification[] = [];
    private waiter: Waiter | null = null;
    private lost: ConnectionLostError | null = null;
    private connected = false;
    private closing = false;

    constructor(
        private readonly config: Readonly<PostgresConfig>,
        private readonly logger: Logger,
        clientFactory: ListenClientFactory = defaultClientFactory,
    ) {
        this.client = clientFactory({
            host: config.host,
            port: config.port,
            database: config.database,
            user: config.username,
            password: config.password,
            // LISTEN needs a long-lived connection.
            keepAlive: true,
            keepAliveInitialDelayMillis: 10000,
        });
        this.client.on("notification", (msg) => this.onNotification(msg));
        this.client.on("error", (err) => this.onLost(err));
        this.client.on("end", () => this.onLost());
    }

    get channel() {
        return this.config.channel;
    }

    async connect() {
        this.logger.debug("Connecting to the PostgreSQL server.");
        try {
            await this.client.connect();
        } catch (e: unknown) {
            throw new ConnectError("postgres", e);
        }
        this.connected = true;
        this.logger.info("Connection to PostgreSQL established.");
    }

    async subscribe() {
        this.logger.debug(
            `Preparing to start listening on channel "${this.channel}".`,
        );
        try {
            await this.client.query(
                `LISTEN ${this.client.escapeIdentifier(this.channel)}`,
            );
        } catch (e: unknown) {
            throw new SubscribeError(this.channel, e);
        }
        this.logger.info(`Listening on channel "${this.channel}".`);
    }

    waitForActivity(timeoutSeconds: number): Promise<boolean> {
        if (this.lost) {
            return Promise.reject(this.lost);
        }
        if (this.buffer.length !== 0) {
            return Promise.resolve(true);
        }
        if (this.waiter) {
            return Promise.reject(
                new Error("Another wait is already in progress."),
            );
        }
        return new Promise<boolean>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.waiter = null;
                resolve(false);
            }, timeoutSeconds * 1000);
            this.waiter = {
                settle: (active) => {
                    clearTimeout(timer);
                    this.waiter = null;
                    resolve(active);
                },
                fail: (error) => {
                    clearTimeout(timer);
                    this.waiter = null;
                    reject(error);
                },
            };
        });
    }

    drain(): Notification[] {
        const drained = this.buffer;
        this.buffer = [];
        return drained;
    }

    async close() {
        if (this.closing) {
            return;
        }
        this.closing = true;
        this.waiter?.settle(false);
        if (!this.connected) {
            return;
        }
        await this.client.end();
        this.logger.debug("Connection to PostgreSQL closed.");
    }

    private onNotification(msg: PgNotification) {
        if (msg.channel !== this.channel) {
            return;
        }
        this.buffer.push({ payload: msg.payload ?? "" });
        this.waiter?.settle(true);
    }

    private onLost(err?: Error) {
        if (this.closing || this.lost) {
            return;
        }
        if (err) {
            this.logger.error(`PostgreSQL connection error: ${err.message}`);
        }
        this.lost = new ConnectionLostError("postgres", err);
        this.waiter?.fail(this.lost);
    }
}

export const createPgSubscription: SubscriptionFactory = (config, logger) =>
    new PgSubscription(config, logger);
