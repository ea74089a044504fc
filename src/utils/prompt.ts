/** Replace {{name}} placeholders. Unknown placeholders are left as written. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) =>
    key in values ? (values[key] ?? "") : placeholder,
  );
}
