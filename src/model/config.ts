export interface RabbitMQConfig {
    host: string;
    port: number;
    vhost: string;
    /** Empty selects the broker's default exchange. */
    exchange: string;
    exchangeType: string;
    username: string;
    password: string;
    queue?: string;
}

export interface PostgresConfig {
    host: string;
    port: number;
    database: string;
    channel: string;
    username: string;
    password: string;
}

export interface BridgeConfig {
    readonly name: string;
    readonly rabbitmq: Readonly<RabbitMQConfig>;
    readonly postgres: Readonly<PostgresConfig>;
}
