/**
 * Namespaced structured logger for the inventory connector.
 *
 * Env:
 *  - LOG_ENABLED=0            -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|... -> min level (default: info)
 *  - LOG_JSON=1               -> JSON lines (default: pretty text)
 *  - LOG_SERVICE_NAME=name    -> service tag (default: openstack-inventory)
 *
 * Meta keys that look like credentials are masked before they are written.
 */

type LevelName = "trace" | "debug" | "info" | "warn" | "error";

export interface LogMeta {
    [key: string]: unknown;
    error?: unknown;
    err?: unknown;
}

export interface Logger {
    trace(message: string, meta?: LogMeta): void;
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
    child(namespace: string | string[]): Logger;
}

const LEVELS: Record<LevelName, number> = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
};

const SECRET_KEYS = /pass(word)?|secret|token|authorization|cookie/i;

function isLevelName(value: string): value is LevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function resolveMinLevel(raw: string | undefined): number {
    const name = (raw || "info").toLowerCase();
    return isLevelName(name) ? LEVELS[name] : LEVELS.info;
}

const ENABLED = process.env.LOG_ENABLED !== "0";
const MIN_LEVEL = resolveMinLevel(process.env.LOG_LEVEL);
const AS_JSON = process.env.LOG_JSON === "1";
const SERVICE = process.env.LOG_SERVICE_NAME || "openstack-inventory";

function serializeError(err: unknown): unknown {
    if (!(err instanceof Error)) return err;
    if ("toJSON" in err && typeof err.toJSON === "function") return err.toJSON();
    return { name: err.name, message: err.message, stack: err.stack };
}

function redact(meta: LogMeta): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(meta)) {
        if (key === "err" || key === "error") {
            out[key] = serializeError(value);
        } else if (SECRET_KEYS.test(key)) {
            out[key] = "[REDACTED]";
        } else {
            out[key] = value;
        }
    }
    return out;
}

function safeStringify(obj: unknown): string {
    try {
        return JSON.stringify(obj);
    } catch {
        return '{"_":"[unserializable]"}';
    }
}

function emit(levelValue: number, line: string): void {
    if (levelValue >= LEVELS.error) {
        console.error(line);
    } else if (levelValue >= LEVELS.warn) {
        console.warn(line);
    } else {
        console.log(line);
    }
}

function createLogger(segments: string[]): Logger {
    const namespace = segments.join(":");

    const write = (level: LevelName, msg: string, meta?: LogMeta) => {
        const levelValue = LEVELS[level];
        if (!ENABLED || levelValue < MIN_LEVEL) return;

        const ts = new Date().toISOString();
        const cleanMeta = meta ? redact(meta) : undefined;

        if (AS_JSON) {
            emit(
                levelValue,
                safeStringify({
                    ts,
                    level,
                    ns: namespace || undefined,
                    service: SERVICE,
                    pid: process.pid,
                    msg,
                    ...(cleanMeta ? { meta: cleanMeta } : {}),
                })
            );
            return;
        }

        const tags = [`[${ts}]`, `[${SERVICE}]`, `[${level.toUpperCase()}]`, namespace && `[${namespace}]`]
            .filter(Boolean)
            .join(" ");
        const tail = cleanMeta ? ` ${safeStringify(cleanMeta)}` : "";
        emit(levelValue, `${tags} ${msg}${tail}`);
    };

    return {
        trace: (m, meta) => write("trace", m, meta),
        debug: (m, meta) => write("debug", m, meta),
        info: (m, meta) => write("info", m, meta),
        warn: (m, meta) => write("warn", m, meta),
        error: (m, meta) => write("error", m, meta),
        child: (sub) => createLogger([...segments, ...(Array.isArray(sub) ? sub : [sub])]),
    };
}

const logger = createLogger([]);

export default logger;
