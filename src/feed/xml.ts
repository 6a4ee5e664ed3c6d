// XML 文本转义


export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}


/** 含标签的文本用 CDATA 包裹，其余做转义 */
export function textOrCdata(s: string): string {
  if (s.includes("<") || s.includes(">")) {
    return `<![CDATA[${s.replace(/\]\]>/g, "]]]]><![CDATA[>")}]]>`;
  }
  return escapeXml(s);
}
