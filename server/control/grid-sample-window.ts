/**
 * Gleitendes Fenster der letzten Netzleistungs-Samples (kW).
 * Bei Überlauf fallen die ältesten Werte raus.
 */
export class GridSampleWindow {
  private samples: number[] = [];

  constructor(readonly maxLength: number) {
    if (!Number.isInteger(maxLength) || maxLength < 1) {
      throw new RangeError(`GridSampleWindow: maxLength muss >= 1 sein (war ${maxLength})`);
    }
  }

  push(sampleKw: number): void {
    this.samples.push(sampleKw);
    if (this.samples.length > this.maxLength) {
      this.samples = this.samples.slice(-this.maxLength);
    }
  }

  mean(): number | null {
    if (this.samples.length === 0) {
      return null;
    }
    const sum = this.samples.reduce((acc, value) => acc + value, 0);
    return sum / this.samples.length;
  }

  reset(): void {
    this.samples = [];
  }

  get size(): number {
    return this.samples.length;
  }

  isEmpty(): boolean {
    return this.samples.length === 0;
  }

  values(): number[] {
    return [...this.samples];
  }
}
