export interface RateEstimate {
  /** Smoothed bytes/sec, absent until the estimate is trustworthy */
  speed?: number
  /** Seconds remaining, absent when speed is unknown or zero */
  eta?: number
}

export interface RateEstimatorOptions {
  /** Smoothing factor of the moving average, 0 < alpha <= 1 */
  alpha?: number
  /** Elapsed seconds after which the estimate is trusted */
  warmupSeconds?: number
  /** Sample count after which the estimate is trusted */
  warmupSamples?: number
  now?: () => number
}

/**
 * TransferRateEstimator: exponential moving average over per-chunk rates.
 * The estimate stays absent until enough time or samples have accumulated.
 */
export class TransferRateEstimator {
  private readonly alpha: number
  private readonly warmupMs: number
  private readonly warmupSamples: number
  private readonly now: () => number

  private startedAt: number | null = null
  private lastSampleAt: number | null = null
  private ema = 0
  private samples = 0
  private pendingBytes = 0

  constructor(options: RateEstimatorOptions = {}) {
    this.alpha = options.alpha ?? 0.2
    this.warmupMs = (options.warmupSeconds ?? 2) * 1000
    this.warmupSamples = options.warmupSamples ?? 8
    this.now = options.now ?? Date.now
  }

  /** Mark the start of the byte stream */
  start(): void {
    const t = this.now()
    this.startedAt = t
    this.lastSampleAt = t
  }

  /** Record `bytes` received since the previous sample */
  sample(bytes: number): void {
    const t = this.now()
    if (this.startedAt === null || this.lastSampleAt === null) {
      this.startedAt = t
      this.lastSampleAt = t
    }

    const dt = (t - this.lastSampleAt) / 1000
    this.lastSampleAt = t
    if (dt <= 0) {
      // Same tick: fold the bytes into the next interval
      this.pendingBytes += bytes
      return
    }

    const rate = (bytes + this.pendingBytes) / dt
    this.pendingBytes = 0
    this.ema = this.samples === 0 ? rate : this.alpha * rate + (1 - this.alpha) * this.ema
    this.samples++
  }

  get isReliable(): boolean {
    if (this.startedAt === null || this.ema <= 0) return false
    const elapsed = this.now() - this.startedAt
    return elapsed >= this.warmupMs || this.samples >= this.warmupSamples
  }

  estimate(remainingBytes: number): RateEstimate {
    if (!this.isReliable) return {}
    const speed = this.ema
    return { speed, eta: speed > 0 ? Math.max(0, remainingBytes) / speed : undefined }
  }

  reset(): void {
    this.startedAt = null
    this.lastSampleAt = null
    this.ema = 0
    this.samples = 0
    this.pendingBytes = 0
  }
}
