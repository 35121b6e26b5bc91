const PARAGRAPH =
  'The harbor committee met on Tuesday to review the tide tables for the coming season. ' +
  'Members compared the readings from the north pier with the older gauges near the lighthouse, ' +
  'and agreed that the new sensors report water levels more consistently than the previous equipment. ' +
  'Fishing crews asked for the updated schedule to be posted at the market before the spring weekend.';

export function articlePage(opts: { title?: string; paragraphs?: number; lang?: string } = {}): string {
  const title = opts.title ?? 'Harbor Committee Reviews Tide Tables';
  const body = Array.from({ length: opts.paragraphs ?? 4 }, () => `<p>${PARAGRAPH}</p>`).join('\n');
  return `<!DOCTYPE html>
<html lang="${opts.lang ?? 'en'}">
<head>
  <title>${title}</title>
  <meta name="author" content="Test Author">
  <meta property="article:published_time" content="2026-03-01T08:30:00Z">
  <meta property="article:tag" content="harbor">
  <meta property="article:tag" content="tides">
</head>
<body>
  <nav><a href="/">Home</a></nav>
  <article>
    <h1>${title}</h1>
    ${body}
  </article>
</body>
</html>`;
}
