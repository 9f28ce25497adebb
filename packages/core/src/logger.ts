/** Where progress and warnings go */
export type Logger = Pick<Console, "log" | "warn">;
