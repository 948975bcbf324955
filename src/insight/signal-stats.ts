/**
 * Per-signal running statistics.
 *
 * O(1) update per sample: min/max, Welford mean/stddev, EMA trend.
 * Non-finite samples (NaN from unparsable fields, ±Inf) are counted but kept out of the stats.
 */

export type TrendDirection = 'up' | 'down' | 'flat';

export interface SignalStats {
    name: string;
    count: number;
    nonFiniteCount: number;
    last: number;
    lastTimestamp: number;
    min: number;
    max: number;
    mean: number;
    stddev: number;
    ema: number;
    direction: TrendDirection;
    /** |last - ema| relative to the observed range, 0 when the range is empty. */
    magnitude: number;
    zScore: number;
}

export interface SignalStatsConfig {
    emaAlpha?: number;
    /** Fraction of the observed range the last value must move away from the EMA to count as a trend. */
    flatBand?: number;
}

interface RunningStats {
    count: number;
    nonFiniteCount: number;
    last: number;
    lastTimestamp: number;
    min: number;
    max: number;
    mean: number;
    m2: number;
    ema: number;
}

export class SignalStatsTracker {
    private readonly signals = new Map<string, RunningStats>();
    private readonly emaAlpha: number;
    private readonly flatBand: number;

    constructor(config: SignalStatsConfig = {}) {
        this.emaAlpha = config.emaAlpha ?? 0.3;
        this.flatBand = config.flatBand ?? 0.005;
    }

    onSample(name: string, timestamp: number, value: number): void {
        let stats = this.signals.get(name);
        if (!stats) {
            stats = {
                count: 0,
                nonFiniteCount: 0,
                last: NaN,
                lastTimestamp: timestamp,
                min: Infinity,
                max: -Infinity,
                mean: 0,
                m2: 0,
                ema: NaN,
            };
            this.signals.set(name, stats);
        }

        stats.lastTimestamp = timestamp;
        if (!Number.isFinite(value)) {
            stats.nonFiniteCount++;
            return;
        }

        stats.count++;
        stats.last = value;
        stats.ema = stats.count === 1 ? value : (this.emaAlpha * value) + ((1 - this.emaAlpha) * stats.ema);

        const oldMean = stats.mean;
        stats.mean = oldMean + (value - oldMean) / stats.count;
        stats.m2 += (value - oldMean) * (value - stats.mean);

        if (value < stats.min) stats.min = value;
        if (value > stats.max) stats.max = value;
    }

    get(name: string): SignalStats | null {
        const stats = this.signals.get(name);
        return stats ? this.toPublic(name, stats) : null;
    }

    /** Stats for the given names, in that order; names without samples are left out. */
    list(names: readonly string[]): SignalStats[] {
        const out: SignalStats[] = [];
        for (const name of names) {
            const stats = this.get(name);
            if (stats) out.push(stats);
        }
        return out;
    }

    get count(): number {
        return this.signals.size;
    }

    private toPublic(name: string, stats: RunningStats): SignalStats {
        const stddev = stats.count > 1 ? Math.sqrt(stats.m2 / (stats.count - 1)) : 0;
        const range = stats.count > 0 ? stats.max - stats.min : 0;
        const delta = stats.last - stats.ema;

        let direction: TrendDirection = 'flat';
        if (range > 0 && delta > range * this.flatBand) direction = 'up';
        else if (range > 0 && delta < -range * this.flatBand) direction = 'down';

        return {
            name,
            count: stats.count,
            nonFiniteCount: stats.nonFiniteCount,
            last: stats.last,
            lastTimestamp: stats.lastTimestamp,
            min: stats.count > 0 ? stats.min : NaN,
            max: stats.count > 0 ? stats.max : NaN,
            mean: stats.count > 0 ? stats.mean : NaN,
            stddev,
            ema: stats.ema,
            direction,
            magnitude: range > 0 ? Math.abs(delta) / range : 0,
            zScore: stddev > 0 ? (stats.last - stats.mean) / stddev : 0,
        };
    }
}
