import type { RabbitMQConfig } from "../model/config";
import type { ParsedMessage } from "../model/notification";
import { describeError } from "../utils/errors";
import type { Logger } from "../utils/log";

export interface BrokerConnection {
    publish(message: ParsedMessage): Promise<void>;
    close(): Promise<void>;
}

export type BrokerConnector = (
    config: Readonly<RabbitMQConfig>,
    logger: Logger,
) => Promise<BrokerConnection>;

export interface RepublishContext {
    bridge: string;
    config: Readonly<RabbitMQConfig>;
    connect: BrokerConnector;
    logger: Logger;
}

/**
 * Publish one message and report whether it went out.
 *
 * Given `null`, a connection is opened for this message alone and closed
 * again whatever the outcome. A given connection is left open for reuse.
 * Failures are logged and the message is dropped; nothing is thrown.
 */
export async function republish(
    connection: BrokerConnection | null,
    message: ParsedMessage,
    payload: string,
    { bridge, config, connect, logger }: RepublishContext,
): Promise<boolean> {
    let ephemeral: BrokerConnection | null = null;
    try {
        let target = connection;
        if (target === null) {
            ephemeral = await connect(config, logger);
            target = ephemeral;
        }
        await target.publish(message);
        logger.info(`Message republished via "${bridge}" bridge.`);
        logger.debug(`Routing key: ${message.routingKey}`);
        logger.debug(`Message: ${message.body}`);
        return true;
    } catch (e: unknown) {
        logger.warn(
            `Unable to republish message via "${bridge}" bridge; discarding. (${describeError(e)}) Message content: ${payload}`,
        );
        return false;
    } finally {
        if (ephemeral) {
            await closeQuietly(ephemeral, logger);
        }
    }
}

async function closeQuietly(connection: BrokerConnection, logger: Logger) {
    try {
        await connection.close();
    } catch (e: unknown) {
        logger.warn(`Error closing RabbitMQ connection: ${describeError(e)}`);
    }
}
