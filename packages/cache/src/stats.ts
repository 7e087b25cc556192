export interface CacheStatsSnapshot {
	hits: number;
	misses: number;
	sets: number;
	deletes: number;
	errors: number;
	/** hits / (hits + misses), 0 before the first lookup */
	hitRate: number;
	/** Seconds since the tracker was created */
	uptime: number;
}

/**
 * Operation counters for one cache manager
 */
export class CacheStats {
	hits = 0;
	misses = 0;
	sets = 0;
	deletes = 0;
	errors = 0;
	readonly startedAt: number;

	constructor(private readonly now: () => number = Date.now) {
		this.startedAt = now();
	}

	recordHit(): void {
		this.hits++;
	}

	recordMiss(): void {
		this.misses++;
	}

	recordSet(): void {
		this.sets++;
	}

	recordDelete(): void {
		this.deletes++;
	}

	recordError(): void {
		this.errors++;
	}

	get hitRate(): number {
		const lookups = this.hits + this.misses;
		return lookups > 0 ? this.hits / lookups : 0;
	}

	get uptime(): number {
		return (this.now() - this.startedAt) / 1000;
	}

	snapshot(): CacheStatsSnapshot {
		return {
			hits: this.hits,
			misses: this.misses,
			sets: this.sets,
			deletes: this.deletes,
			errors: this.errors,
			hitRate: this.hitRate,
			uptime: this.uptime,
		};
	}
}
