import { z } from "zod";

export const LogLevelSchema = z.enum(["error", "warn", "info", "debug", "silly"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(["json", "pretty"]);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Environment variables the library reads. Everything has a default, so an
 * empty environment is valid.
 */
export const EnvSchema = z.object({
    GRIDFIGHT_LOG_LEVEL: LogLevelSchema.default("warn"),
    GRIDFIGHT_LOG_FORMAT: LogFormatSchema.default("pretty"),
    GRIDFIGHT_LOG_SILENT: z.enum(["true", "false"]).default("false").transform(v => v === "true"),
});

export interface IConfig {
    logging: {
        level: LogLevel;
        format: LogFormat;
        silent: boolean;
    };
}

export const loadConfig = (env: Record<string, string | undefined> = process.env): IConfig => {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        const problems = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new Error(`Invalid environment configuration: ${problems}`);
    }
    return {
        logging: {
            level: result.data.GRIDFIGHT_LOG_LEVEL,
            format: result.data.GRIDFIGHT_LOG_FORMAT,
            silent: result.data.GRIDFIGHT_LOG_SILENT,
        },
    };
}

export const config: IConfig = loadConfig();
