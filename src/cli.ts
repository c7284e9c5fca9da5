import { parseArgs } from "node:util";
import { BridgeSupervisor } from "./bridge/Supervisor";
import { loadBridgeConfigs } from "./utils/config";
import { ConfigError, describeError } from "./utils/errors";
import { createLogger } from "./utils/log";

const logger = createLogger("cli");

export const USAGE = `Usage: notify-bridge [options] <config...>

Bridge PostgreSQL NOTIFYs to RabbitMQ, one bridge per config file.

Arguments:
  config                     bridge config file or glob pattern (YAML)

Options:
  -p, --persistent           keep one RabbitMQ connection open per bridge
      --allow-duplicate-names
                             let a later config replace an earlier one with
                             the same bridge name
      --no-banner            do not print the startup banner
  -h, --help                 show this help

Environment:
  LOG_LEVEL                  error | warn | info | debug (default: info)
`;

export const BANNER = `
##############################################################

   notify-bridge
   PostgreSQL LISTEN/NOTIFY  ->  RabbitMQ

##############################################################
`;

export interface CommandLine {
    configFiles: string[];
    persistent: boolean;
    allowDuplicateNames: boolean;
    banner: boolean;
    help: boolean;
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        Object.setPrototypeOf(this, UsageError.prototype);
    }
}

export function parseCommandLine(argv: string[]): CommandLine {
    const { values, positionals } = (() => {
        try {
            return parseArgs({
                args: argv,
                allowPositionals: true,
                options: {
                    persistent: { type: "boolean", short: "p", default: false },
                    "allow-duplicate-names": {
                        type: "boolean",
                        default: false,
                    },
                    "no-banner": { type: "boolean", default: false },
                    help: { type: "boolean", short: "h", default: false },
                },
            });
        } catch (e: unknown) {
            throw new UsageError(describeError(e));
        }
    })();
    const help = values.help === true;
    if (!help && positionals.length === 0) {
        throw new UsageError("At least one config file is required.");
    }
    return {
        configFiles: positionals,
        persistent: values.persistent === true,
        allowDuplicateNames: values["allow-duplicate-names"] === true,
        banner: values["no-banner"] !== true,
        help,
    };
}

/**
 * Run the bridges described on the command line until every one of them has
 * ended. Resolves with the process exit status.
 */
export async function runCli(argv: string[]): Promise<number> {
    let args: CommandLine;
    try {
        args = parseCommandLine(argv);
    } catch (e: unknown) {
        if (e instanceof UsageError) {
            logger.error(e.message);
            process.stderr.write(USAGE);
            return 1;
        }
        throw e;
    }
    if (args.help) {
        process.stdout.write(USAGE);
        return 0;
    }
    if (args.banner) {
        process.stdout.write(BANNER);
    }

    let supervisor: BridgeSupervisor;
    try {
        const configs = loadBridgeConfigs(args.configFiles, {
            allowDuplicateNames: args.allowDuplicateNames,
        });
        supervisor = new BridgeSupervisor(configs, {
            persistent: args.persistent,
        });
    } catch (e: unknown) {
        if (e instanceof ConfigError) {
            logger.error(e.message);
            logger.error("Unable to continue; exiting.");
            return 1;
        }
        throw e;
    }

    supervisor.enableGracefulShutdown();
    await supervisor.start();
    const outcomes = await supervisor.wait();
    return outcomes.some((outcome) => outcome.state === "fatal") ? 1 : 0;
}
