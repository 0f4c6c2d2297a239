// QR codes for share links

import QRCode from 'qrcode';

export async function renderQrDataUrl(url: string): Promise<string> {
  return QRCode.toDataURL(url, {
    errorCorrectionLevel: 'M',
    margin: 5,
    scale: 10,
    color: { dark: '#000000', light: '#ffffff' },
  });
}
