import { Buffer } from "node:buffer";

function pdfEscape(input: string): string {
  return input.replace(/\\/g, "\\\\").replace(/\(/g, "\\(").replace(/\)/g, "\\)");
}

function contentStream(lines: string[]): string {
  const ops = ["BT", "/F1 11 Tf", "50 790 Td"];
  lines.forEach((line, i) => {
    if (i > 0) {
      ops.push("0 -14 Td");
    }
    ops.push(`(${pdfEscape(line)}) Tj`);
  });
  ops.push("ET");
  return ops.join("\n");
}

/**
 * Minimal PDF with one Helvetica text line per entry; `pages[i]` holds the
 * lines of page i + 1. An empty array yields a document with no pages.
 */
export function buildTextPdf(pages: string[][]): Buffer {
  const fontRef = 3;
  const pageRefs = pages.map((_, i) => 4 + i * 2);

  const objects: string[] = [];
  objects.push("1 0 obj << /Type /Catalog /Pages 2 0 R >> endobj");
  objects.push(
    `2 0 obj << /Type /Pages /Kids [${pageRefs.map((ref) => `${ref} 0 R`).join(" ")}] /Count ${pages.length} >> endobj`,
  );
  objects.push(`${fontRef} 0 obj << /Type /Font /Subtype /Type1 /BaseFont /Helvetica >> endobj`);
  pages.forEach((lines, i) => {
    const pageRef = pageRefs[i];
    const contentRef = pageRef + 1;
    const stream = contentStream(lines);
    objects.push(
      `${pageRef} 0 obj << /Type /Page /Parent 2 0 R /MediaBox [0 0 595 842] /Resources << /Font << /F1 ${fontRef} 0 R >> >> /Contents ${contentRef} 0 R >> endobj`,
    );
    objects.push(
      `${contentRef} 0 obj << /Length ${Buffer.byteLength(stream, "utf8")} >> stream\n${stream}\nendstream endobj`,
    );
  });

  const header = "%PDF-1.4\n";
  let body = "";
  const offsets: number[] = [];
  for (const obj of objects) {
    offsets.push(Buffer.byteLength(header + body, "utf8"));
    body += `${obj}\n`;
  }

  const xrefStart = Buffer.byteLength(header + body, "utf8");
  let xref = `xref\n0 ${objects.length + 1}\n`;
  xref += "0000000000 65535 f \n";
  for (const offset of offsets) {
    xref += `${offset.toString().padStart(10, "0")} 00000 n \n`;
  }

  const trailer = `trailer << /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefStart}\n%%EOF\n`;
  return Buffer.from(header + body + xref + trailer, "utf8");
}
