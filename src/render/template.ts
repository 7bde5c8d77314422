/**
 * Evaluation tree.
 *
 * A compiled template is a tree of these nodes. Nodes are immutable once
 * built and hold no per-render state, so one tree can render any number of
 * contexts.
 */

import type { Property, TemplateProperty } from "../values/property";
import { formatProperty } from "../values/display";
import {
  FormatRecorder,
  type Formatter,
  type LabeledSegment,
  LabeledTextFormatter,
  PlainTextFormatter,
} from "./formatter";

export interface Template<C> {
  format(context: C, formatter: Formatter): void;
}

/**
 * Fixed text. Compiled templates render literals as constant properties so
 * methods apply to them; this node is for trees assembled by hand.
 */
export class LiteralTemplate<C> implements Template<C> {
  readonly text: string;

  constructor(text: string) {
    this.text = text;
  }

  format(_context: C, formatter: Formatter): void {
    formatter.write(this.text);
  }
}

/**
 * Children rendered one after another.
 */
export class ListTemplate<C> implements Template<C> {
  readonly templates: readonly Template<C>[];

  constructor(templates: readonly Template<C>[]) {
    this.templates = templates;
  }

  format(context: C, formatter: Formatter): void {
    for (const template of this.templates) {
      template.format(context, formatter);
    }
  }
}

/**
 * Renders its content under labels computed per context.
 */
export class LabelTemplate<C> implements Template<C> {
  readonly content: Template<C>;
  readonly labels: TemplateProperty<C, readonly string[]>;

  constructor(content: Template<C>, labels: TemplateProperty<C, readonly string[]>) {
    this.content = content;
    this.labels = labels;
  }

  format(context: C, formatter: Formatter): void {
    const labels = this.labels(context);
    for (const label of labels) {
      formatter.pushLabel(label);
    }
    this.content.format(context, formatter);
    for (let i = 0; i < labels.length; i++) {
      formatter.popLabel();
    }
  }
}

export class ConditionalTemplate<C> implements Template<C> {
  readonly condition: TemplateProperty<C, boolean>;
  readonly trueTemplate: Template<C>;
  readonly falseTemplate: Template<C> | undefined;

  constructor(
    condition: TemplateProperty<C, boolean>,
    trueTemplate: Template<C>,
    falseTemplate?: Template<C>
  ) {
    this.condition = condition;
    this.trueTemplate = trueTemplate;
    this.falseTemplate = falseTemplate;
  }

  format(context: C, formatter: Formatter): void {
    if (this.condition(context)) {
      this.trueTemplate.format(context, formatter);
    } else {
      this.falseTemplate?.format(context, formatter);
    }
  }
}

/**
 * Joins the non-empty contents with the separator. Contents that write no
 * text are dropped, so there is never a leading, trailing or doubled
 * separator.
 */
export class SeparateTemplate<C> implements Template<C> {
  readonly separator: Template<C>;
  readonly contents: readonly Template<C>[];

  constructor(separator: Template<C>, contents: readonly Template<C>[]) {
    this.separator = separator;
    this.contents = contents;
  }

  format(context: C, formatter: Formatter): void {
    let first = true;
    for (const content of this.contents) {
      const recorder = new FormatRecorder();
      content.format(context, recorder);
      if (recorder.isEmpty()) continue;
      if (!first) {
        this.separator.format(context, formatter);
      }
      recorder.replay(formatter);
      first = false;
    }
  }
}

/**
 * Renders a property's value in its canonical text form.
 */
export class FormattablePropertyTemplate<C> implements Template<C> {
  readonly property: Property<C>;

  constructor(property: Property<C>) {
    this.property = property;
  }

  format(context: C, formatter: Formatter): void {
    formatProperty(this.property, context, formatter);
  }
}

/**
 * Turn a template back into a string property. Labels are dropped.
 */
export function plainTextProperty<C>(template: Template<C>): TemplateProperty<C, string> {
  return (context) => renderToString(template, context);
}

export function renderToString<C>(template: Template<C>, context: C): string {
  const formatter = new PlainTextFormatter();
  template.format(context, formatter);
  return formatter.toString();
}

export function renderLabeled<C>(template: Template<C>, context: C): readonly LabeledSegment[] {
  const formatter = new LabeledTextFormatter();
  template.format(context, formatter);
  return formatter.getSegments();
}
