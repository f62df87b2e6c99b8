import type { ActivityLogRepository } from "../repositories/auditRunRepository";

export type EventFields = Record<string, unknown>;

export interface EventLogger {
    info(event: string, fields?: EventFields): void;
    error(event: string, fields?: EventFields): void;
}

type LineWriter = (line: string) => void;

export type EventLoggerOptions = {
    /** Where JSON lines go; the CLIs point this at stderr so stdout only carries the report. */
    write?: LineWriter;
    activity?: Pick<ActivityLogRepository, "append">;
    clock?: () => Date;
};

export function createEventLogger(options: EventLoggerOptions = {}): EventLogger {
    const write = options.write ?? ((line: string) => console.log(line));
    const clock = options.clock ?? (() => new Date());

    function emit(level: "info" | "error", event: string, fields: EventFields): void {
        const ts = clock().toISOString();
        write(JSON.stringify({ ts, level, event, ...fields }));
        options.activity?.append(event, { level, ...fields }, ts);
    }

    return {
        info: (event, fields = {}) => emit("info", event, fields),
        error: (event, fields = {}) => emit("error", event, fields),
    };
}

export const silentLogger: EventLogger = {
    info: () => undefined,
    error: () => undefined,
};
