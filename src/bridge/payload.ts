import type { ParsedMessage } from "../model/notification";
import { InvalidFormatError } from "../utils/errors";

const SEPARATOR = ":";

export type ParseResult =
    | { ok: true; message: ParsedMessage }
    | { ok: false; error: InvalidFormatError };

/**
 * Split a raw notification payload of the form `routing.key:body`.
 * Only the first separator counts; the body keeps any further colons.
 */
export function parsePayload(raw: string): ParseResult {
    const at = raw.indexOf(SEPARATOR);
    if (at === -1) {
        return { ok: false, error: new InvalidFormatError(raw) };
    }
    const routingKey = raw.slice(0, at);
    const body = raw.slice(at + SEPARATOR.length);
    if (!routingKey || !body) {
        return { ok: false, error: new InvalidFormatError(raw) };
    }
    return { ok: true, message: { routingKey, body } };
}
