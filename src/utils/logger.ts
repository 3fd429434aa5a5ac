export interface TimingResult {
    label: string;
    durationMs: number;
}

export type InfoStream = "stdout" | "stderr";

class Logger {
    private static instance: Logger;
    private timings: TimingResult[] = [];
    private timingEnabled: boolean = false;
    private infoStream: InfoStream = "stdout";

    private constructor() {
        // Private constructor to prevent direct instantiation
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    /**
     * Route info messages. The MCP server speaks JSON-RPC on stdout,
     * so it sends everything to stderr.
     */
    public setInfoStream(stream: InfoStream): void {
        this.infoStream = stream;
    }

    public log(message: string): void {
        const line = `[${new Date().toISOString()}] [INFO] ${message}`;
        if (this.infoStream === "stderr") {
            console.error(line);
        } else {
            console.log(line);
        }
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
     * Time an async function and record the result, even when it rejects
     */
    public async timeAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        try {
            return await fn();
        } finally {
            this.timings.push({ label, durationMs: performance.now() - start });
        }
    }

    public getTimings(): TimingResult[] {
        return [...this.timings];
    }

    /**
     * Record a timing directly (useful for manual timing measurements)
     */
    public recordTiming(label: string, durationMs: number): void {
        if (this.timingEnabled) {
            this.timings.push({ label, durationMs });
        }
    }

    /**
     * Print timing summary to stderr. Source timings overlap because
     * sources run concurrently, so percentages are of the summed time.
     */
    public printTimings(): void {
        if (!this.timingEnabled) return;

        if (this.timings.length === 0) {
            console.error("[TIMING] No timings recorded");
            return;
        }

        console.error("\n[TIMING] === Performance Summary ===");
        const total = this.timings.reduce((sum, t) => sum + t.durationMs, 0);

        for (const timing of this.timings) {
            const pct = total > 0 ? ((timing.durationMs / total) * 100).toFixed(1) : "0.0";
            console.error(`[TIMING] ${timing.label.padEnd(36)} ${timing.durationMs.toFixed(2).padStart(9)}ms (${pct.padStart(5)}%)`);
        }

        console.error(`[TIMING] ${"TOTAL".padEnd(36)} ${total.toFixed(2).padStart(9)}ms`);
        console.error("[TIMING] ================================\n");
    }
}

export default Logger;
