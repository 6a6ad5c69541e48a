import { Logger, type LogLevel } from "@nestjs/common";
import * as viem from "viem";
import validate from "zod";

const LOG_LEVELS = ["log", "error", "warn", "debug", "verbose", "fatal"] as const satisfies readonly LogLevel[];
const LEVEL_NAMES = ["none", ...LOG_LEVELS] as const;

const address = validate.string().refine((v) => viem.isAddress(v, { strict: false }), { message: "invalid address" }).transform((v) => viem.getAddress(v));

const schema = validate.object({
    LEDGER_ADDRESS: address,
    LEDGER_OWNER: address,
    LEDGER_FEE_RECIPIENT: address.default(viem.zeroAddress),
    // Comma separated, e.g. "error,warn"; "none" silences the logger
    LEDGER_LOG_LEVELS: validate
        .string()
        .default("log,error,warn")
        .transform((v) => v.split(",").map((level) => level.trim()).filter((level) => level.length > 0))
        .pipe(validate.array(validate.enum(LEVEL_NAMES))),
});

export type Config = {
    address: viem.Address;
    owner: viem.Address;
    feeRecipient: viem.Address;
    logLevels: LogLevel[];
};

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
    const vars = schema.parse(env);
    return {
        address: vars.LEDGER_ADDRESS,
        owner: vars.LEDGER_OWNER,
        feeRecipient: vars.LEDGER_FEE_RECIPIENT,
        logLevels: vars.LEDGER_LOG_LEVELS.filter(isLogLevel),
    };
}

export function configureLogging(config: Pick<Config, "logLevels">): void {
    Logger.overrideLogger(config.logLevels.length > 0 ? config.logLevels : false);
}

function isLogLevel(level: string): level is LogLevel {
    return LOG_LEVELS.some((l) => l === level);
}
