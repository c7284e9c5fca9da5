import * as amqp from "amqplib";
import type { RabbitMQConfig } from "../model/config";
import type { ParsedMessage } from "../model/notification";
import { ConnectError, PublishError, describeError } from "../utils/errors";
import type { Logger } from "../utils/log";
import type { BrokerConnection, BrokerConnector } from "./publisher";

/** The part of an amqplib channel used for publishing. */
export interface AmqpChannel {
    assertExchange(exchange: string, type: string): Promise<unknown>;
    assertQueue(queue: string): Promise<unknown>;
    publish(exchange: string, routingKey: string, content: Buffer): boolean;
    close(): Promise<void>;
    on(event: "error", listener: (err: Error) => void): unknown;
}

/** The part of an amqplib connection used for publishing. */
export interface AmqpConnection {
    createChannel(): Promise<AmqpChannel>;
    close(): Promise<void>;
    on(event: "error", listener: (err: Error) => void): unknown;
    on(event: "close", listener: (err?: Error) => void): unknown;
}

export type AmqpConnect = (
    options: amqp.Options.Connect,
) => Promise<AmqpConnection>;

const defaultConnect: AmqpConnect = (options) => amqp.connect(options);

export class RabbitMQConnection implements BrokerConnection {
    private closed = false;
    constructor(
        private readonly connection: AmqpConnection,
        private readonly config: Readonly<RabbitMQConfig>,
        private readonly logger: Logger,
    ) {
        connection.on("error", (err) => {
            this.logger.error(`RabbitMQ connection error: ${err.message}`);
        });
        connection.on("close", () => {
            if (!this.closed) {
                this.closed = true;
                this.logger.warn("RabbitMQ connection closed by the broker.");
            }
        });
    }

    async publish(message: ParsedMessage) {
        const { exchange, exchangeType, queue } = this.config;
        let channel: AmqpChannel;
        try {
            channel = await this.connection.createChannel();
        } catch (e: unknown) {
            throw new PublishError(e);
        }
        // amqplib emits 'error' when the broker closes the channel and
        // tears the connection down if nothing listens. The pending call
        // rejects on its own.
        channel.on("error", (err) => {
            this.logger.debug(`RabbitMQ channel error: ${err.message}`);
        });
        try {
            if (exchange) {
                await channel.assertExchange(exchange, exchangeType);
            }
            if (queue) {
                await channel.assertQueue(queue);
            }
            channel.publish(
                exchange,
                message.routingKey,
                Buffer.from(message.body),
            );
            await channel.close();
        } catch (e: unknown) {
            await this.closeChannel(channel);
            throw new PublishError(e);
        }
    }

    private async closeChannel(channel: AmqpChannel) {
        try {
            await channel.close();
        } catch (e: unknown) {
            // The broker closes a channel itself after a failed declaration.
            this.logger.debug(`Channel already closed: ${describeError(e)}`);
        }
    }

    async close() {
        if (this.closed) {
            return;
        }
        this.closed = true;
        await this.connection.close();
        this.logger.debug("Connection to RabbitMQ closed.");
    }
}

/**
 * Build a connector that opens authenticated AMQP connections.
 * `connect` is swappable so tests can run without a broker.
 */
export function rabbitMQConnector(
    connect: AmqpConnect = defaultConnect,
): BrokerConnector {
    return async (config, logger) => {
        logger.debug("Connecting to the RabbitMQ broker.");
        let connection: AmqpConnection;
        try {
            connection = await connect({
                protocol: "amqp",
                hostname: config.host,
                port: config.port,
                vhost: config.vhost,
                username: config.username,
                password: config.password,
            });
        } catch (e: unknown) {
            throw new ConnectError("rabbitmq", e);
        }
        logger.info("Connection to RabbitMQ established.");
        return new RabbitMQConnection(connection, config, logger);
    };
}

export const connectRabbitMQ: BrokerConnector = rabbitMQConnector();
