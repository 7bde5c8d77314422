/**
 * Canonical text form of each value kind.
 */

import type { Formatter } from "../render/formatter";
import type { Property } from "./property";
import { formatTimestamp } from "./time";

export function formatProperty<C>(property: Property<C>, context: C, formatter: Formatter): void {
  switch (property.tag) {
    case "String":
      formatter.write(property.extract(context));
      return;
    case "Boolean":
      formatter.write(property.extract(context) ? "true" : "false");
      return;
    case "Integer":
      formatter.write(property.extract(context).toString());
      return;
    case "CommitOrChangeId":
      formatter.write(property.extract(context).hex);
      return;
    case "ShortestIdPrefix": {
      const id = property.extract(context);
      writeLabeled(formatter, "prefix", id.prefix);
      writeLabeled(formatter, "rest", id.rest);
      return;
    }
    case "Signature": {
      const signature = property.extract(context);
      formatter.write(`${signature.name} <${signature.email}>`);
      return;
    }
    case "Timestamp":
      formatter.write(formatTimestamp(property.extract(context)));
      return;
  }
}

function writeLabeled(formatter: Formatter, label: string, text: string): void {
  formatter.pushLabel(label);
  formatter.write(text);
  formatter.popLabel();
}
