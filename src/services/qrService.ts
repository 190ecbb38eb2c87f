import * as QRCode from 'qrcode';

export interface QrRenderOptions {
  width?: number;
  margin?: number;
}

/**
 * Renders a token payload as a PNG data URL for display on the instructor's
 * screen. The payload is encoded verbatim; nothing about the token is added.
 */
export const renderPayloadQr = (payload: string, options: QrRenderOptions = {}): Promise<string> =>
  QRCode.toDataURL(payload, {
    errorCorrectionLevel: 'L',
    width: options.width ?? 320,
    margin: options.margin ?? 4,
  });
