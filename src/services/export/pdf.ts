// Trip itinerary PDF export (Letter size)

import PDFDocument from 'pdfkit';
import type { PlannedTrip } from '../planner/itinerary.js';

const INCH = 72;
const BRAND = '#2d6cdf';
const DAY_HEADING = '#1b4fa0';

const amount = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export function formatInr(value: number): string {
  return `INR ${amount.format(value)}`;
}

// accommodation_estimate_inr -> Accommodation
export function costLabel(key: string): string {
  const words = key.replace(/_estimate_inr$|_inr$/, '').split('_').filter(Boolean).join(' ');
  return words ? words.charAt(0).toUpperCase() + words.slice(1) : key;
}

function slugify(value: string, disallowed: RegExp): string {
  return value.trim().replace(disallowed, '-').replace(/^-+|-+$/g, '');
}

export function pdfFileName(destination: string): string {
  return `trip-${slugify(destination, /[^\p{L}\p{M}\p{N}]+/gu) || 'itinerary'}.pdf`;
}

// Header values must stay ASCII; non-Latin names go in the RFC 5987 filename* parameter
export function pdfContentDisposition(destination: string): string {
  const fallback = `trip-${slugify(destination, /[^A-Za-z0-9]+/g) || 'itinerary'}.pdf`;
  const name = pdfFileName(destination);
  if (name === fallback) return `attachment; filename="${fallback}"`;
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(name)}`;
}

function collect(doc: PDFKit.PDFDocument): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
  });
}

export async function renderTripPdf(trip: PlannedTrip): Promise<Buffer> {
  const doc = new PDFDocument({ size: 'LETTER', margin: INCH, bufferPages: true });
  const done = collect(doc);
  const { request, itinerary } = trip;
  const contentWidth = doc.page.width - 2 * INCH;

  doc.font('Helvetica-Bold').fontSize(24).fillColor(BRAND).text(`Your Trip to ${request.destination}`);
  doc.moveDown(0.5);
  doc.font('Helvetica').fontSize(12).fillColor('black');
  doc.text(`From: ${request.source}`);
  doc.text(`Dates: ${request.start_date} to ${request.return_date}`);
  doc.moveDown(0.5);
  rule(doc);
  doc.moveDown();

  for (const day of itinerary.plan) {
    doc.font('Helvetica-Bold').fontSize(16).fillColor(DAY_HEADING)
      .text(`Day ${day.day}: ${day.theme} (${day.date})`, INCH, doc.y, { width: contentWidth });
    doc.moveDown(0.4);

    for (const activity of day.activities) {
      doc.font('Helvetica-Bold').fontSize(11).fillColor('black')
        .text(`${activity.time}:`, INCH + 0.2 * INCH, doc.y, { continued: true })
        .font('Helvetica').fontSize(10)
        .text(` ${activity.description} (${activity.location_name})`, { width: contentWidth - 0.2 * INCH });
      doc.moveDown(0.3);
    }
    doc.moveDown();
  }

  const costs = itinerary.cost_breakdown;
  rule(doc);
  doc.moveDown();
  doc.font('Helvetica-Bold').fontSize(18).fillColor(BRAND).text('Estimated Cost Breakdown', INCH);
  doc.moveDown(0.5);

  doc.font('Helvetica').fontSize(12).fillColor('black');
  for (const [key, value] of Object.entries(costs)) {
    if (key === 'total_estimate_inr') continue;
    costLine(doc, `${costLabel(key)}:`, formatInr(value), contentWidth);
  }
  doc.moveDown(0.5);
  rule(doc);
  doc.moveDown(0.5);
  doc.font('Helvetica-Bold').fontSize(14);
  costLine(doc, 'Total Estimated Cost:', formatInr(costs.total_estimate_inr), contentWidth);

  if (trip.warnings.length > 0) {
    doc.moveDown();
    doc.font('Helvetica-Oblique').fontSize(10).fillColor('#a33');
    for (const warning of trip.warnings) doc.text(warning, INCH);
  }

  numberPages(doc);
  doc.end();
  return done;
}

function rule(doc: PDFKit.PDFDocument): void {
  doc.moveTo(INCH, doc.y).lineTo(doc.page.width - INCH, doc.y).stroke();
}

function costLine(doc: PDFKit.PDFDocument, label: string, value: string, width: number): void {
  const y = doc.y;
  doc.text(label, INCH, y, { width });
  doc.text(value, INCH, y, { width, align: 'right' });
}

// Continuation pages get a page number in the bottom-right corner
function numberPages(doc: PDFKit.PDFDocument): void {
  const range = doc.bufferedPageRange();
  for (let i = range.start + 1; i < range.start + range.count; i++) {
    doc.switchToPage(i);
    const bottom = doc.page.margins.bottom;
    doc.page.margins.bottom = 0;
    doc.font('Helvetica').fontSize(9).fillColor('black')
      .text(`Page ${i + 1}`, doc.page.width - 2 * INCH, doc.page.height - 0.5 * INCH, { width: INCH, align: 'right' });
    doc.page.margins.bottom = bottom;
  }
}
