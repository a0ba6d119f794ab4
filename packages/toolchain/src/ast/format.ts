import type { ConstantValue } from "./nodes.js";

const formatNumber = (value: number): string => {
  if (Number.isNaN(value)) return "nan";
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  return String(value);
};

const formatString = (value: string): string => {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let body = "";
  for (const char of value) {
    if (char === "\\") body += "\\\\";
    else if (char === "\n") body += "\\n";
    else if (char === "\t") body += "\\t";
    else if (char === "\r") body += "\\r";
    else if (char === quote) body += `\\${quote}`;
    else body += char;
  }
  return `${quote}${body}${quote}`;
};

/** Renders a constant the way it would be written in source */
export const formatConstant = (value: ConstantValue): string => {
  if (value === null) return "None";
  if (value === true) return "True";
  if (value === false) return "False";
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "bigint") return String(value);
  if (typeof value === "string") return formatString(value);
  const items = value.map(formatConstant);
  return items.length === 1 ? `(${items[0]},)` : `(${items.join(", ")})`;
};

/** Key that identifies equal constants of the same type */
export const constantKey = (value: ConstantValue): string => {
  if (value === null) return "none";
  if (typeof value === "boolean") return `bool:${value}`;
  if (typeof value === "number") return `num:${formatNumber(value)}`;
  if (typeof value === "bigint") return `int:${value}`;
  if (typeof value === "string") return `str:${JSON.stringify(value)}`;
  return `tuple:[${value.map(constantKey).join(",")}]`;
};

export const isTruthy = (value: ConstantValue): boolean => {
  if (value === null) return false;
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  if (typeof value === "bigint") return value !== 0n;
  return value.length > 0;
};
