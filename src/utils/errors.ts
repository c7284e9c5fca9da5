export type BridgeErrorKind =
    | "config"
    | "connect"
    | "subscribe"
    | "connection-lost"
    | "publish"
    | "invalid-format";

export type Target = "postgres" | "rabbitmq";

export abstract class BridgeError extends Error {
    abstract readonly kind: BridgeErrorKind;
    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        Object.setPrototypeOf(this, new.target.prototype);
        this.name = new.target.name;
    }
}

export class ConfigError extends BridgeError {
    readonly kind = "config";
    readonly problems: string[];
    constructor(source: string, problems: string[]) {
        super(`${source}: ${problems.join(" ")}`);
        this.problems = problems;
    }
}

export class ConnectError extends BridgeError {
    readonly kind = "connect";
    readonly target: Target;
    constructor(target: Target, cause?: unknown) {
        super(
            target === "postgres"
                ? "Could not connect to PostgreSQL server."
                : "Could not connect to RabbitMQ broker.",
            cause,
        );
        this.target = target;
    }
}

export class SubscribeError extends BridgeError {
    readonly kind = "subscribe";
    readonly channel: string;
    constructor(channel: string, cause?: unknown) {
        super(`Could not listen on channel "${channel}".`, cause);
        this.channel = channel;
    }
}

export class ConnectionLostError extends BridgeError {
    readonly kind = "connection-lost";
    readonly target: Target;
    constructor(target: Target, cause?: unknown) {
        super(
            target === "postgres"
                ? "Connection to PostgreSQL lost."
                : "Connection to RabbitMQ lost.",
            cause,
        );
        this.target = target;
    }
}

export class PublishError extends BridgeError {
    readonly kind = "publish";
    constructor(cause?: unknown) {
        super(`Unable to publish message: ${describeError(cause)}`, cause);
    }
}

export class InvalidFormatError extends BridgeError {
    readonly kind = "invalid-format";
    readonly payload: string;
    constructor(payload: string) {
        super("Improperly formatted message received.");
        this.payload = payload;
    }
}

/**
 * Fatal errors end the bridge (or, for configuration, the process);
 * everything else only drops the message at hand.
 */
export function isFatal(error: BridgeError): boolean {
    return error.kind !== "publish" && error.kind !== "invalid-format";
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
