import { INestApplication } from '@nestjs/common';
import { Test, TestingModuleBuilder } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { OptimizerService } from '../src/optimizer/optimizer.service';
import { RANDOM_INT } from '../src/optimizer/random.provider';

const validBody = {
  title: 'Guide',
  html_code: '<p>Hello world</p>',
  focus_keyword: 'Test',
  seo_score: 20,
};

async function createApp(
  configure?: (builder: TestingModuleBuilder) => void,
): Promise<INestApplication> {
  const builder = Test.createTestingModule({ imports: [AppModule] });
  builder.overrideProvider(RANDOM_INT).useValue((min: number) => min);
  configure?.(builder);
  const moduleRef = await builder.compile();
  const app = configureApp(moduleRef.createNestApplication({ logger: false }));
  await app.init();
  return app;
}

describe('Blog SEO Optimizer API (e2e)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET / describes the service', async () => {
    const res = await request(app.getHttpServer()).get('/').expect(200);
    expect(res.body.name).toBe('Blog SEO Optimizer API');
    expect(res.body.version).toBe('1.0.0');
    expect(res.body.features).toHaveLength(6);
  });

  it('GET /api/health reports healthy', async () => {
    const res = await request(app.getHttpServer()).get('/api/health').expect(200);
    expect(res.body).toEqual({
      status: 'healthy',
      service: 'Blog SEO Optimizer API',
      version: '1.0.0',
    });
  });

  it('GET /api/features lists the features in order', async () => {
    const res = await request(app.getHttpServer()).get('/api/features').expect(200);
    expect(res.body.features).toHaveLength(6);
    expect(res.body.features[0]).toEqual({
      name: 'Title Tag Optimization',
      description: 'Optimize title tags with focus keywords (up to 60 characters)',
      icon: '⚡',
    });
    expect(res.body.features[5].name).toBe('Schema Markup');
  });

  it('POST /api/optimize rewrites the post', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/optimize')
      .send(validBody)
      .expect(200);

    expect(res.body.success).toBe(true);
    const { data } = res.body;
    expect(data.optimized_title).toBe('Test - Guide');
    expect(data.title_length).toBe(12);
    expect(data.meta_length).toBe(160);
    expect(data.optimized_body).toContain('Test konusunda Hello world');
    expect(data.optimized_body).toContain('<h2>Test Nedir?</h2>');
    expect(data.optimized_html).toContain('<meta name="description"');
    expect(data.suggested_tags).toHaveLength(5);
    expect(data.image_metadata.image_title).toBe('test-rehberi');
    expect(data.seo_score_before).toBe(20);
    expect(data.seo_score_after).toBe(86);
    expect(data.improvement).toBe(66);
    expect(data.word_count).toBe(93);
    expect(data.degraded_steps).toEqual([]);
  });

  it('POST /api/optimize accepts the optional fields', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/optimize')
      .send({
        ...validBody,
        categories: ['Seyahat'],
        tags: ['vize'],
        image: 'https://example.com/a.png',
        schema: 'BlogPosting',
      })
      .expect(200);

    expect(res.body.data.optimized_html).toContain('"@type": "BlogPosting"');
    expect(res.body.data.optimized_html).toContain(
      '<meta name="keywords" content="Test, vize, Test rehberi, Test nedir, Test nasıl yapılır, Test 2025">',
    );
    expect(res.body.data.seo_score_after).toBe(88);
  });

  it.each(['title', 'html_code', 'focus_keyword', 'seo_score'])(
    'POST /api/optimize without %s is a 400',
    async (field) => {
      const body: Record<string, unknown> = { ...validBody };
      delete body[field];

      const res = await request(app.getHttpServer())
        .post('/api/optimize')
        .send(body)
        .expect(400);
      expect(res.body).toEqual({ error: `Missing required field: ${field}`, success: false });
    },
  );

  it('POST /api/optimize rejects an out-of-range score', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/optimize')
      .send({ ...validBody, seo_score: 150 })
      .expect(400);
    expect(res.body).toEqual({
      error: 'seo_score must not be greater than 100',
      success: false,
    });
  });

  it('POST /api/optimize ignores unknown properties', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/optimize')
      .send({ ...validBody, post_id: 7 })
      .expect(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data.optimized_title).toBe('Test - Guide');
  });

  it('POST /api/optimize rejects a blank focus keyword', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/optimize')
      .send({ ...validBody, focus_keyword: '   ' })
      .expect(400);
    expect(res.body).toEqual({ error: 'focus_keyword should not be empty', success: false });
  });

  it('POST /api/analyze scores without rewriting', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/analyze')
      .send({ html_code: '<title>Visa</title><h1>Visa</h1>', focus_keyword: 'Visa' })
      .expect(200);

    expect(res.body).toEqual({
      success: true,
      data: {
        score: 15,
        checks: [
          { check: 'title_tag', points: 10 },
          { check: 'h1', points: 5 },
        ],
        word_count: 2,
        keyword_count: 2,
        keyword_density: 100,
      },
    });
  });

  it('unknown routes use the error envelope', async () => {
    const res = await request(app.getHttpServer()).get('/nope').expect(404);
    expect(res.body).toEqual({ error: 'Cannot GET /nope', success: false });
  });
});

describe('Blog SEO Optimizer API errors (e2e)', () => {
  const failingService = {
    optimize: () => {
      throw new Error('boom');
    },
  };

  afterEach(() => {
    delete process.env.EXPOSE_ERROR_DETAILS;
  });

  it('echoes the error message when details are exposed', async () => {
    process.env.EXPOSE_ERROR_DETAILS = 'true';
    const app = await createApp((builder) => {
      builder.overrideProvider(OptimizerService).useValue(failingService);
    });

    const res = await request(app.getHttpServer())
      .post('/api/optimize')
      .send(validBody)
      .expect(500);
    expect(res.body).toEqual({ error: 'boom', success: false });
    await app.close();
  });

  it('hides the error message otherwise', async () => {
    process.env.EXPOSE_ERROR_DETAILS = 'false';
    const app = await createApp((builder) => {
      builder.overrideProvider(OptimizerService).useValue(failingService);
    });

    const res = await request(app.getHttpServer())
      .post('/api/optimize')
      .send(validBody)
      .expect(500);
    expect(res.body).toEqual({ error: 'Internal server error', success: false });
    await app.close();
  });
});
