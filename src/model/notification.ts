/** A pending event delivered by PostgreSQL on the subscribed channel. */
export interface Notification {
    payload: string;
}

/** A notification split into its broker routing key and message body. */
export interface ParsedMessage {
    routingKey: string;
    body: string;
}
