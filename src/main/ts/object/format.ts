import type { Value } from "./values.js";

export function formatValue(value: Value): string {
  if (value === null) return "null";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value !== "object") return String(value);

  switch (value.kind) {
    case "class":
      return `<class ${value.name}>`;
    case "instance":
      return `<${value.cls.name} instance>`;
    case "invocable":
      return `<function ${value.name}>`;
    case "descriptor":
      return `<descriptor ${value.name}>`;
    case "bound":
      return `<bound ${value.callable.name} of ${formatValue(value.receiver)}>`;
  }
}
