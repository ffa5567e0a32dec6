/**
 * Outcome accounting for one broadcast. Built fresh per call.
 */
export interface DeliveryReportJSON {
  total: number;
  successful: number;
  failed: number;
  failed_ids: string[];
  errors: Record<string, string>;
  success_rate: string;
}

export class DeliveryReport {
  readonly total: number;
  private successCount = 0;
  private readonly failedIdList: string[] = [];
  private readonly errorMap: Record<string, string> = {};

  constructor(total: number) {
    this.total = total;
  }

  get successful(): number {
    return this.successCount;
  }

  get failed(): number {
    return this.failedIdList.length;
  }

  get failedIds(): readonly string[] {
    return this.failedIdList;
  }

  get errors(): Readonly<Record<string, string>> {
    return this.errorMap;
  }

  /** True once every recipient has an outcome. */
  get isSettled(): boolean {
    return this.successful + this.failed === this.total;
  }

  get successRate(): number {
    return this.total === 0 ? 0 : this.successful / this.total;
  }

  recordSuccess(): void {
    this.successCount++;
  }

  recordFailure(recipientId: string, error: string): void {
    this.failedIdList.push(recipientId);
    this.errorMap[recipientId] = error;
  }

  toJSON(): DeliveryReportJSON {
    return {
      total: this.total,
      successful: this.successful,
      failed: this.failed,
      failed_ids: [...this.failedIdList],
      errors: { ...this.errorMap },
      success_rate: `${(this.successRate * 100).toFixed(1)}%`,
    };
  }
}
