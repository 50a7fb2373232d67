export function urlset(...locs: string[]): string {
  const entries = locs.map((loc) => `  <url><loc>${loc}</loc></url>`).join("\n");
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</urlset>`;
}

export function sitemapIndex(...locs: string[]): string {
  const entries = locs
    .map((loc) => `  <sitemap><loc>${loc}</loc></sitemap>`)
    .join("\n");
  return `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</sitemapindex>`;
}

export function productPage(name: string, imagePath: string, weight = "1.5 lb"): string {
  return `<!DOCTYPE html>
<html>
<head>
  <title>${name} | Shop</title>
  <meta property="og:image" content="https://cdn.shop.test${imagePath}">
</head>
<body>
  <h1>${name}</h1>
  <div class="product-description"><p>Sturdy tool for daily work.</p></div>
  <table class="specs-table">
    <tr><td>Weight</td><td>${weight}</td></tr>
  </table>
</body>
</html>`;
}
