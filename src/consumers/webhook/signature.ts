import crypto from "crypto";

export const SIGNATURE_HEADER = "X-Webhook-Signature";

/**
 * Generate HMAC-SHA256 signature for webhook
 */
export function generateSignature(payload: string, secret: string): string {
    return crypto
        .createHmac("sha256", secret)
        .update(payload)
        .digest("hex");
}
