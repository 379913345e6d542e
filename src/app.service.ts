import { Injectable } from '@nestjs/common';

export const SERVICE_NAME = 'Blog SEO Optimizer API';
export const SERVICE_VERSION = '1.0.0';

export interface Feature {
  name: string;
  description: string;
  icon: string;
}

const FEATURES: Feature[] = [
  {
    name: 'Title Tag Optimization',
    description: 'Optimize title tags with focus keywords (up to 60 characters)',
    icon: '⚡',
  },
  {
    name: 'Meta Description',
    description: 'Generate SEO-friendly meta descriptions (150-160 characters)',
    icon: '📝',
  },
  {
    name: 'Keyword Density',
    description: 'Optimize keyword density to 1.5-2.5%',
    icon: '🎯',
  },
  {
    name: 'Image Alt Text',
    description: 'Add SEO-friendly alt text to images',
    icon: '🖼️',
  },
  {
    name: 'Link Optimization',
    description: 'Add internal and external links',
    icon: '🔗',
  },
  {
    name: 'Schema Markup',
    description: 'Add structured data markup',
    icon: '📊',
  },
];

@Injectable()
export class AppService {
  getInfo() {
    return {
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: 'running',
      features: FEATURES.map((feature) => feature.name),
    };
  }

  getHealth() {
    return { status: 'healthy', service: SERVICE_NAME, version: SERVICE_VERSION };
  }

  getFeatures(): { features: Feature[] } {
    return { features: FEATURES.map((feature) => ({ ...feature })) };
  }
}
