import type { Bounds, CompositeRegion, DrawingContext } from "../../src/index.js";
import { RecordingContext } from "./recording-context.js";

/** Fixed-size region that marks itself on a RecordingContext. */
export class StubRegion implements CompositeRegion {
  background = "";
  foreground = "";
  /** Background seen at the moment vectorize ran */
  backgroundDuringExport: string | null = null;
  vectorized = false;

  constructor(
    readonly id: string,
    private width: number,
    private height: number,
    private result: boolean | Error = true,
  ) {}

  getWidth(): number {
    return this.width;
  }
  getHeight(): number {
    return this.height;
  }
  getBounds(): Bounds {
    return { minX: 0, minY: 0, maxX: this.width, maxY: this.height };
  }
  setBackground(color: string): void {
    this.background = color;
  }
  setForeground(color: string): void {
    this.foreground = color;
  }
  vectorize(dc: DrawingContext): boolean {
    this.vectorized = true;
    this.backgroundDuringExport = this.background;
    if (dc instanceof RecordingContext) dc.mark(this.id);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}
