const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, char => XML_ENTITIES[char] ?? char);
}

/**
 * `<name>escaped value</name>`; an absent value renders as an empty element.
 */
export function xmlElement(name: string, value?: string | number): string {
  const text = value === undefined ? '' : escapeXml(String(value));
  return `<${name}>${text}</${name}>`;
}
