export interface TimingResult {
    label: string;
    durationMs: number;
}

/**
 * Stage logger. Writes everything to stderr so stdout stays free for data
 * (CLI JSON output, MCP stdio transport).
 *
 * Entry points share `Logger.getInstance()`. Library code receives a logger
 * through its config, so parallel document runs never share timing state.
 */
class Logger {
    private static instance: Logger | undefined;
    private timings: TimingResult[] = [];
    private timingEnabled: boolean = false;

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public log(message: string): void {
        console.error(`[${new Date().toISOString()}] [INFO] ${message}`);
    }

    public warn(message: string): void {
        console.error(`[${new Date().toISOString()}] [WARN] ${message}`);
    }

    public error(message: string): void {
        console.error(`[${new Date().toISOString()}] [ERROR] ${message}`);
    }

    public debug(message: string, enabled: boolean = true): void {
        if (enabled) {
            console.error(`[${new Date().toISOString()}] [DEBUG] ${message}`);
        }
    }

    /**
     * Enable or disable timing collection
     */
    public setTimingEnabled(enabled: boolean): void {
        this.timingEnabled = enabled;
        if (enabled) {
            this.timings = [];
        }
    }

    /**
     * Time a synchronous function and record the result
     */
    public time<T>(label: string, fn: () => T): T {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = fn();
        const durationMs = performance.now() - start;
        this.timings.push({ label, durationMs });
        return result;
    }

    /**
     * Time an async function and record the result
     */
    public async timeAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = await fn();
        const durationMs = performance.now() - start;
        this.timings.push({ label, durationMs });
        return result;
    }

    public getTimings(): TimingResult[] {
        return [...this.timings];
    }

    /**
     * Print timing summary to stderr
     */
    public printTimings(): void {
        if (this.timings.length === 0) {
            console.error("[TIMING] No timings recorded");
            return;
        }

        console.error("\n[TIMING] === Stage Summary ===");
        const total = this.timings.reduce((sum, t) => sum + t.durationMs, 0);

        for (const timing of this.timings) {
            const pct = total > 0 ? ((timing.durationMs / total) * 100).toFixed(1) : "0.0";
            console.error(`[TIMING] ${timing.label.padEnd(30)} ${timing.durationMs.toFixed(2).padStart(8)}ms (${pct.padStart(5)}%)`);
        }

        console.error(`[TIMING] ${"TOTAL".padEnd(30)} ${total.toFixed(2).padStart(8)}ms`);
        console.error("[TIMING] ============================\n");
    }
}

export default Logger;
