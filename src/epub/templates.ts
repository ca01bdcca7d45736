import { escapeXml } from '../utils/html.ts';
import type { EpubMetadata, ManifestItem, TocEntry } from './package.ts';

export const STYLESHEET_HREF = 'style/main.css';

export const STYLESHEET = `@namespace epub "http://www.idpf.org/2007/ops";
body {
  font-family: Arial, sans-serif;
  line-height: 1.6;
  margin: 0 auto;
  max-width: 800px;
}
h1, h2, h3 {
  text-align: center;
  margin: 1em 0;
}
p {
  margin: 0.5em 0;
  text-indent: 1.5em;
}
img {
  display: block;
  margin: 1em auto;
  max-width: 100%;
}
.centered {
  text-align: center;
}
`;

export const CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;

export function renderPage(title: string, body: string, language: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops"
  lang="${escapeXml(language)}" xml:lang="${escapeXml(language)}">
<head>
  <title>${escapeXml(title)}</title>
  <link rel="stylesheet" type="text/css" href="${STYLESHEET_HREF}"/>
</head>
<body>
${body}
</body>
</html>
`;
}

function renderNavList(entries: TocEntry[], indent: string): string {
  const items = entries.map((entry) => {
    const children = entry.children.length > 0
      ? `\n${renderNavList(entry.children, `${indent}    `)}\n${indent}  `
      : '';
    return `${indent}  <li><a href="${escapeXml(entry.href)}">${escapeXml(entry.title)}</a>${children}</li>`;
  });
  return `${indent}<ol>\n${items.join('\n')}\n${indent}</ol>`;
}

export function renderNav(metadata: EpubMetadata, toc: TocEntry[]): string {
  return renderPage(metadata.title, `<nav epub:type="toc" id="toc">
  <h1>${escapeXml(metadata.title)}</h1>
${renderNavList(toc, '  ')}
</nav>`, metadata.language);
}

export function renderNcx(metadata: EpubMetadata, toc: TocEntry[]): string {
  let playOrder = 0;
  const renderPoints = (entries: TocEntry[], indent: string): string =>
    entries.map((entry) => {
      const order = ++playOrder;
      const children = entry.children.length > 0 ? `\n${renderPoints(entry.children, `${indent}  `)}` : '';
      return [
        `${indent}<navPoint id="navpoint-${order}" playOrder="${order}">`,
        `${indent}  <navLabel><text>${escapeXml(entry.title)}</text></navLabel>`,
        `${indent}  <content src="${escapeXml(entry.href)}"/>${children}`,
        `${indent}</navPoint>`,
      ].join('\n');
    }).join('\n');

  const navMap = renderPoints(toc, '    ');

  return `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>
    <meta name="dtb:uid" content="${escapeXml(metadata.identifier)}"/>
    <meta name="dtb:depth" content="2"/>
    <meta name="dtb:totalPageCount" content="0"/>
    <meta name="dtb:maxPageNumber" content="0"/>
  </head>
  <docTitle><text>${escapeXml(metadata.title)}</text></docTitle>
  <navMap>
${navMap}
  </navMap>
</ncx>
`;
}

export function renderOpf(
  metadata: EpubMetadata,
  items: readonly ManifestItem[],
  spine: readonly string[],
  modified: Date,
): string {
  const timestamp = modified.toISOString().replace(/\.\d{3}Z$/, 'Z');
  const cover = items.find((item) => item.properties === 'cover-image');

  const metadataLines = [
    `    <dc:identifier id="book-id">${escapeXml(metadata.identifier)}</dc:identifier>`,
    `    <dc:title>${escapeXml(metadata.title)}</dc:title>`,
    `    <dc:language>${escapeXml(metadata.language)}</dc:language>`,
    metadata.description ? `    <dc:description>${escapeXml(metadata.description)}</dc:description>` : undefined,
    `    <meta property="dcterms:modified">${timestamp}</meta>`,
    cover ? `    <meta name="cover" content="${escapeXml(cover.id)}"/>` : undefined,
  ].filter((line): line is string => line !== undefined);

  const manifestLines = items.map((item) => {
    const properties = item.properties ? ` properties="${escapeXml(item.properties)}"` : '';
    const href = escapeXml(item.href);
    const mediaType = escapeXml(item.mediaType);
    return `    <item id="${escapeXml(item.id)}" href="${href}" media-type="${mediaType}"${properties}/>`;
  });

  const spineLines = spine.map((id) => `    <itemref idref="${escapeXml(id)}"/>`);

  return `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="book-id"
  xml:lang="${escapeXml(metadata.language)}">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
${metadataLines.join('\n')}
  </metadata>
  <manifest>
${manifestLines.join('\n')}
  </manifest>
  <spine toc="ncx">
${spineLines.join('\n')}
  </spine>
</package>
`;
}
