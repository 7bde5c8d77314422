/**
 * Formatters receive rendered text plus the label stack it was written under.
 * Labels are metadata for a styling layer, never inline markup.
 */

export interface Formatter {
  write(text: string): void;
  pushLabel(label: string): void;
  popLabel(): void;
}

/**
 * Collects text and ignores labels.
 */
export class PlainTextFormatter implements Formatter {
  private output = "";

  write(text: string): void {
    this.output += text;
  }

  pushLabel(_label: string): void {}

  popLabel(): void {}

  toString(): string {
    return this.output;
  }
}

export type LabeledSegment = {
  text: string;
  labels: readonly string[];
};

/**
 * Collects text as segments tagged with the labels active when written.
 * Consecutive writes under the same labels are merged into one segment.
 */
export class LabeledTextFormatter implements Formatter {
  private readonly labels: string[] = [];
  private readonly segments: LabeledSegment[] = [];

  write(text: string): void {
    if (text === "") return;
    const last = this.segments[this.segments.length - 1];
    if (last && sameLabels(last.labels, this.labels)) {
      this.segments[this.segments.length - 1] = { text: last.text + text, labels: last.labels };
    } else {
      this.segments.push({ text, labels: [...this.labels] });
    }
  }

  pushLabel(label: string): void {
    this.labels.push(label);
  }

  popLabel(): void {
    this.labels.pop();
  }

  getSegments(): readonly LabeledSegment[] {
    return this.segments;
  }

  toString(): string {
    return this.segments.map((segment) => segment.text).join("");
  }
}

function sameLabels(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((label, i) => label === b[i]);
}

type FormatOp =
  | { op: "write"; text: string }
  | { op: "pushLabel"; label: string }
  | { op: "popLabel" };

/**
 * Records formatter calls so they can be replayed into another formatter.
 */
export class FormatRecorder implements Formatter {
  private readonly ops: FormatOp[] = [];
  private written = false;

  write(text: string): void {
    if (text !== "") this.written = true;
    this.ops.push({ op: "write", text });
  }

  pushLabel(label: string): void {
    this.ops.push({ op: "pushLabel", label });
  }

  popLabel(): void {
    this.ops.push({ op: "popLabel" });
  }

  /** True when no text was written; labels alone do not count. */
  isEmpty(): boolean {
    return !this.written;
  }

  replay(formatter: Formatter): void {
    for (const op of this.ops) {
      switch (op.op) {
        case "write":
          formatter.write(op.text);
          break;
        case "pushLabel":
          formatter.pushLabel(op.label);
          break;
        case "popLabel":
          formatter.popLabel();
          break;
      }
    }
  }
}
