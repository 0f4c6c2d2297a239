export { renderTripPdf, pdfContentDisposition, formatInr } from './pdf.js';
export { renderQrDataUrl } from './qr.js';
