import { describe, it, expect } from 'vitest';
import { costLabel, formatInr, pdfContentDisposition, pdfFileName, renderTripPdf } from '../pdf.js';
import { renderQrDataUrl } from '../qr.js';
import type { PlannedTrip } from '../../planner/itinerary.js';

const trip: PlannedTrip = {
  request: {
    source: 'Delhi',
    destination: 'Jaipur',
    start_date: '2026-11-20',
    return_date: '2026-11-22',
    budget: 20000,
    interests: ['heritage'],
    language: 'English',
  },
  itinerary: {
    plan: Array.from({ length: 3 }, (_, i) => ({
      day: i + 1,
      date: `2026-11-${20 + i}`,
      theme: `Day theme ${i + 1}`,
      activities: Array.from({ length: 6 }, (_, j) => ({
        time: `${9 + j}:00`,
        description: `Activity ${j + 1} with a longer description that has to wrap across the line`,
        location_name: `Place ${j + 1}`,
        latitude: 26.9,
        longitude: 75.8,
      })),
    })),
    cost_breakdown: {
      accommodation_estimate_inr: 7000,
      transport_estimate_inr: 3000,
      activities_estimate_inr: 2000,
      food_estimate_inr: 3000,
      total_estimate_inr: 15000,
    },
  },
  warnings: ['Estimated total of 21000 INR exceeds the budget of 20000 INR.'],
};

describe('PDF export', () => {
  it('renders a PDF document', async () => {
    const pdf = await renderTripPdf(trip);

    expect(Buffer.isBuffer(pdf)).toBe(true);
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pdf.length).toBeGreaterThan(1000);
  });

  it('formats amounts with grouping', () => {
    expect(formatInr(15000)).toBe('INR 15,000');
    expect(formatInr(1234567)).toBe('INR 1,234,567');
  });

  it('builds a safe file name', () => {
    expect(pdfFileName('Jaipur')).toBe('trip-Jaipur.pdf');
    expect(pdfFileName('New Delhi / NCR')).toBe('trip-New-Delhi-NCR.pdf');
    expect(pdfFileName('  ')).toBe('trip-itinerary.pdf');
    expect(pdfFileName('वाराणसी')).toBe('trip-वाराणसी.pdf');
  });

  it('keeps the attachment header ASCII for non-Latin destinations', () => {
    expect(pdfContentDisposition('Jaipur')).toBe('attachment; filename="trip-Jaipur.pdf"');
    expect(pdfContentDisposition('वाराणसी')).toBe(
      'attachment; filename="trip-itinerary.pdf"; '
        + "filename*=UTF-8''trip-%E0%A4%B5%E0%A4%BE%E0%A4%B0%E0%A4%BE%E0%A4%A3%E0%A4%B8%E0%A5%80.pdf",
    );
  });

  it('labels whatever cost categories the itinerary has', async () => {
    expect(costLabel('accommodation_estimate_inr')).toBe('Accommodation');
    expect(costLabel('local_guide_inr')).toBe('Local guide');
    expect(costLabel('visa_fees')).toBe('Visa fees');

    const custom: PlannedTrip = {
      ...trip,
      itinerary: {
        ...trip.itinerary,
        cost_breakdown: { stay_estimate_inr: 6000, local_guide_inr: 1500, total_estimate_inr: 7500 },
      },
    };
    const pdf = await renderTripPdf(custom);

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });
});

describe('QR codes', () => {
  it('renders a PNG data URL', async () => {
    const dataUrl = await renderQrDataUrl('http://localhost:8080/shared/share-1');

    expect(dataUrl.startsWith('data:image/png;base64,')).toBe(true);
  });
});
