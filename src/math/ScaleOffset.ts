// ═══════════════════════════════════════════════════════════════════
// SCALE / OFFSET PAIRS - layout coordinates
//
// A ScaleOffset is a fraction of a parent dimension plus a fixed
// offset; ScaleOffset2 pairs one per axis.
// ═══════════════════════════════════════════════════════════════════

export class ScaleOffset {
  constructor(public scale = 0, public offset = 0) {}

  clone(): ScaleOffset {
    return new ScaleOffset(this.scale, this.offset);
  }

  equals(other: ScaleOffset): boolean {
    return this.scale === other.scale && this.offset === other.offset;
  }
}

export class ScaleOffset2 {
  constructor(
    public x: ScaleOffset = new ScaleOffset(),
    public y: ScaleOffset = new ScaleOffset(),
  ) {}

  static fromValues(xScale: number, xOffset: number, yScale: number, yOffset: number): ScaleOffset2 {
    return new ScaleOffset2(new ScaleOffset(xScale, xOffset), new ScaleOffset(yScale, yOffset));
  }

  clone(): ScaleOffset2 {
    return new ScaleOffset2(this.x.clone(), this.y.clone());
  }

  equals(other: ScaleOffset2): boolean {
    return this.x.equals(other.x) && this.y.equals(other.y);
  }
}
