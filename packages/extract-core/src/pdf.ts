import * as mupdf from 'mupdf';

/**
 * Reads the embedded text layer of a PDF, one entry per page.
 * Scanned pages yield empty strings.
 */
export function readPdfPages(bytes: Uint8Array): string[] {
  let doc: mupdf.Document | undefined;
  try {
    doc = mupdf.Document.openDocument(bytes, 'application/pdf');
    const pageCount = doc.countPages();
    const pageTexts: string[] = [];
    for (let i = 0; i < pageCount; i++) {
      let page: mupdf.Page | undefined;
      let structuredText: mupdf.StructuredText | undefined;
      try {
        page = doc.loadPage(i);
        structuredText = page.toStructuredText('preserve-whitespace');
        pageTexts.push(structuredText.asText());
      } finally {
        structuredText?.destroy();
        page?.destroy();
      }
    }
    return pageTexts;
  } finally {
    doc?.destroy();
  }
}

/**
 * Renders every page of a PDF to a PNG image for optical recognition.
 * @param scale Zoom factor; 2 renders at 144 dpi.
 */
export function renderPdfPages(bytes: Uint8Array, scale: number): Uint8Array[] {
  let doc: mupdf.Document | undefined;
  try {
    doc = mupdf.Document.openDocument(bytes, 'application/pdf');
    const pageCount = doc.countPages();
    const images: Uint8Array[] = [];
    for (let i = 0; i < pageCount; i++) {
      let page: mupdf.Page | undefined;
      let pixmap: mupdf.Pixmap | undefined;
      try {
        page = doc.loadPage(i);
        pixmap = page.toPixmap(mupdf.Matrix.scale(scale, scale), mupdf.ColorSpace.DeviceRGB, false, true);
        images.push(pixmap.asPNG());
      } finally {
        pixmap?.destroy();
        page?.destroy();
      }
    }
    return images;
  } finally {
    doc?.destroy();
  }
}
