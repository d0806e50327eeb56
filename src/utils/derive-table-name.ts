/**
 * Table name for a stateful class: snake_case, last word pluralized.
 * E.g. "Vehicle" -> "vehicles", "DeliveryCompany" -> "delivery_companies",
 * "HTTPRequest" -> "http_requests".
 */
export function deriveTableName(className: string): string {
  const words = className
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .split('_')
    .filter((word) => word.length > 0);

  const last = words.pop();
  if (last === undefined) {
    throw new Error(`Cannot derive a table name from "${className}"`);
  }
  return [...words, pluralize(last)].join('_');
}

function pluralize(word: string): string {
  if (/[^aeiou]y$/.test(word)) {
    return `${word.slice(0, -1)}ies`;
  }
  if (/(s|x|z|ch|sh)$/.test(word)) {
    return `${word}es`;
  }
  return `${word}s`;
}
