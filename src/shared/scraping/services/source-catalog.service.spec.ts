import { ConfigurationError } from '@/shared/errors/crawl.errors';
import { makeSettings } from '@/shared/testing/fakes';
import {
  SourceCatalogService,
  parseSourceCatalog,
} from './source-catalog.service';

const template = (urlTemplate: string) => ({
  urlTemplate,
  expect: { contentType: 'html' },
});

describe('parseSourceCatalog', () => {
  it('fills defaults for optional fields', () => {
    const catalog = parseSourceCatalog({
      'structured-database': template('https://db.example.test/?q={query}'),
      'search-engine': template('https://search.example.test/?q={query}'),
      'browser-automation': template('https://db.example.test/page?q={query}'),
    });

    expect(catalog['structured-database']).toEqual({
      enabled: true,
      urlTemplate: 'https://db.example.test/?q={query}',
      expect: { contentType: 'html', markers: [] },
    });
    expect(catalog['direct-url'].enabled).toBe(true);
  });

  it('rejects a template without a query placeholder', () => {
    expect(() =>
      parseSourceCatalog({
        'structured-database': template('https://db.example.test/'),
        'search-engine': template('https://search.example.test/?q={query}'),
        'browser-automation': template('https://db.example.test/page?q={query}'),
      }),
    ).toThrow(ConfigurationError);
  });
});

describe('SourceCatalogService', () => {
  it('loads the shipped catalog', () => {
    const service = new SourceCatalogService(makeSettings());

    expect(service.get('search-engine').expect.markers).toEqual(['b_algo']);
    expect(service.get('direct-url').urlTemplate).toBeUndefined();
  });

  it('fails on a missing catalog file', () => {
    expect(
      () =>
        new SourceCatalogService(
          makeSettings({ sourcesPath: 'config/missing-sources.json' }),
        ),
    ).toThrow(/Cannot read source catalog/);
  });
});
