import { registerAs } from '@nestjs/config';

export interface OptimizerConfig {
  siteUrl: string;
  authorName: string;
  publisherName: string;
  publisherLogo: string;
  suggestedTagCount?: number;
  exposeErrorDetails: boolean;
}

const DEFAULT_SITE_URL = 'https://example.com';

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const port = config.PORT;
  if (port !== undefined && !/^\d+$/.test(String(port))) {
    throw new Error(`PORT must be a number, got "${String(port)}"`);
  }

  const tagCount = config.SUGGESTED_TAG_COUNT;
  if (tagCount !== undefined && tagCount !== '') {
    const count = Number(tagCount);
    if (!Number.isInteger(count) || count < 5 || count > 10) {
      throw new Error('SUGGESTED_TAG_COUNT must be an integer between 5 and 10');
    }
  }

  const expose = config.EXPOSE_ERROR_DETAILS;
  if (expose !== undefined && expose !== 'true' && expose !== 'false') {
    throw new Error('EXPOSE_ERROR_DETAILS must be "true" or "false"');
  }

  const siteUrl = config.SITE_URL;
  if (siteUrl !== undefined && !/^https?:\/\//.test(String(siteUrl))) {
    throw new Error('SITE_URL must be an http(s) URL');
  }
  return config;
}

export default registerAs('optimizer', (): OptimizerConfig => {
  const siteUrl = (process.env.SITE_URL || DEFAULT_SITE_URL).replace(/\/+$/, '');
  const exposeFlag = process.env.EXPOSE_ERROR_DETAILS;

  return {
    siteUrl,
    authorName: process.env.AUTHOR_NAME || 'Editör',
    publisherName: process.env.PUBLISHER_NAME || 'Blog',
    publisherLogo: process.env.PUBLISHER_LOGO || `${siteUrl}/logo.png`,
    suggestedTagCount: optionalInt(process.env.SUGGESTED_TAG_COUNT),
    exposeErrorDetails:
      exposeFlag !== undefined
        ? exposeFlag === 'true'
        : process.env.NODE_ENV !== 'production',
  };
});
