/**
 * Cloudflare Images upload client
 */

import { z } from 'zod';
import { logger } from '../../utils/logging';

const uploadResponseSchema = z.object({
  success: z.boolean(),
  result: z
    .object({
      id: z.string(),
      filename: z.string(),
      variants: z.array(z.string()),
    })
    .nullish(),
  errors: z
    .array(
      z.object({
        code: z.number(),
        message: z.string(),
      })
    )
    .optional(),
});

export interface CloudflareCredentials {
  accountId: string;
  apiToken: string;
}

type FetchFn = typeof fetch;

export class CloudflareImagesClient {
  private readonly imagesApiUrl: string;

  constructor(
    private readonly credentials: CloudflareCredentials,
    private readonly fetchFn: FetchFn = fetch
  ) {
    this.imagesApiUrl = `https://api.cloudflare.com/client/v4/accounts/${credentials.accountId}/images/v1`;
  }

  /**
   * Upload one image and return its first delivery variant URL.
   * `metadata` is stored alongside the image on Cloudflare.
   */
  async uploadImage(
    fileBuffer: Buffer,
    fileName: string,
    mimeType: string,
    metadata?: Record<string, string>
  ): Promise<string> {
    const formData = new FormData();
    formData.append('file', new Blob([new Uint8Array(fileBuffer)], { type: mimeType }), fileName);
    if (metadata) {
      formData.append('metadata', JSON.stringify(metadata));
    }

    const response = await this.fetchFn(this.imagesApiUrl, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.credentials.apiToken}`,
      },
      body: formData,
    });

    const parsed = uploadResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected response from Cloudflare (status ${response.status})`);
    }
    const data = parsed.data;

    if (!response.ok || !data.success) {
      const errorMessage = data.errors?.[0]?.message || `Upload failed with status ${response.status}`;
      logger.error('Error uploading to Cloudflare', { fileName, mimeType, error: errorMessage });
      throw new Error(errorMessage);
    }

    if (!data.result) {
      throw new Error('Upload succeeded but no result returned');
    }

    return data.result.variants[0] ?? data.result.filename;
  }
}
