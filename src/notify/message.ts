const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** One-based content id of the n-th inline image. */
export function imageCid(index: number): string {
  return `image${index + 1}`;
}

export function formatUsage(usageGb: number): string {
  return usageGb.toFixed(2);
}

export function buildReportHtml(
  body: string,
  rows: ReadonlyArray<{ bucketName: string; usageGb: number; objectCount: number }>,
  imageCount: number,
): string {
  const tableRows = rows
    .map(
      (r) =>
        `<tr><td>${escapeHtml(r.bucketName)}</td>` +
        `<td align="right">${formatUsage(r.usageGb)}</td>` +
        `<td align="right">${r.objectCount}</td></tr>`,
    )
    .join("\n");

  const images = Array.from(
    { length: imageCount },
    (_, i) => `<p><img src="cid:${imageCid(i)}"></p>`,
  ).join("\n");

  return [
    "<html>",
    "<body>",
    `<pre>${escapeHtml(body)}</pre>`,
    '<table border="1" cellpadding="4" cellspacing="0">',
    "<tr><th>bucket</th><th>usage(GB)</th><th>objects</th></tr>",
    tableRows,
    "</table>",
    images,
    "</body>",
    "</html>",
  ]
    .filter((part) => part.length > 0)
    .join("\n");
}
