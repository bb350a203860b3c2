import fs from 'fs-extra';
import path from 'path';
import { FakeArchive } from './helpers/fakeArchive';
import { fixturePath, TestPaths } from './test-config';

const METADATA_URL = 'https://archive.org/metadata/nasa';
const META_XML_URL = 'https://archive.org/download/nasa/nasa_meta.xml';

describe('download', () => {
  const destdir = TestPaths.unit.download;
  let fixture: object;

  beforeAll(async () => {
    fixture = await fs.readJSON(fixturePath('nasa_meta.json'));
  });

  beforeEach(async () => {
    await fs.ensureDir(destdir);
  });

  afterEach(async () => {
    await fs.remove(destdir);
  });

  const nasaArchive = () =>
    new FakeArchive().on('GET', METADATA_URL, { body: fixture }).on('GET', META_XML_URL, { body: 'test content' });

  it('should write the file under <destdir>/<identifier>/<name>', async () => {
    const archive = nasaArchive();
    const item = await archive.session().getItem('nasa');

    const results = await item.download({ files: 'nasa_meta.xml', destdir });

    const target = path.join(destdir, 'nasa', 'nasa_meta.xml');
    expect(results).toEqual([{ name: 'nasa_meta.xml', url: META_XML_URL, path: target, status: 'downloaded' }]);
    expect(await fs.readFile(target, 'utf8')).toBe('test content');
    expect(archive.requests.map(request => request.url)).toEqual([METADATA_URL, META_XML_URL]);
  });

  it('should skip the identifier directory when asked', async () => {
    const item = await nasaArchive().session().getItem('nasa');

    await item.download({ files: ['nasa_meta.xml'], destdir, noDirectory: true });

    expect(await fs.readFile(path.join(destdir, 'nasa_meta.xml'), 'utf8')).toBe('test content');
  });

  it('should skip files whose local checksum matches', async () => {
    const target = path.join(destdir, 'nasa', 'nasa_meta.xml');
    await fs.outputFile(target, 'test content');
    const archive = nasaArchive();
    const item = await archive.session().getItem('nasa');

    const [result] = await item.download({ files: 'nasa_meta.xml', destdir, checksum: true });

    expect(result.status).toBe('skipped');
    expect(archive.requests).toHaveLength(1);
  });

  it('should replace a stale local copy when checksums differ', async () => {
    const target = path.join(destdir, 'nasa', 'nasa_meta.xml');
    await fs.outputFile(target, 'old bytes');
    const item = await nasaArchive().session().getItem('nasa');

    const [result] = await item.download({ files: 'nasa_meta.xml', destdir, checksum: true });

    expect(result.status).toBe('downloaded');
    expect(await fs.readFile(target, 'utf8')).toBe('test content');
  });

  it('should skip existing files with ignoreExisting', async () => {
    const target = path.join(destdir, 'nasa', 'nasa_meta.xml');
    await fs.outputFile(target, 'old bytes');
    const item = await nasaArchive().session().getItem('nasa');

    const [result] = await item.download({ files: 'nasa_meta.xml', destdir, ignoreExisting: true });

    expect(result.status).toBe('skipped');
    expect(await fs.readFile(target, 'utf8')).toBe('old bytes');
  });

  it('should plan without downloading in dry-run mode', async () => {
    const archive = nasaArchive();
    const item = await archive.session().getItem('nasa');

    const results = await item.download({ formats: 'JPEG', dryRun: true, destdir });

    expect(results.map(result => [result.url, result.status])).toEqual([
      ['https://archive.org/download/nasa/NASAarchiveLogo.jpg', 'planned'],
      ['https://archive.org/download/nasa/globe_west_540.jpg', 'planned'],
    ]);
    expect(archive.requests).toHaveLength(1);
  });

  it('should record failures and continue with the batch', async () => {
    const archive = nasaArchive().on('GET', 'https://archive.org/download/nasa/nasa_reviews.xml', {
      status: 403,
      body: 'Forbidden',
    });
    const item = await archive.session().getItem('nasa');

    const results = await item.download({ files: ['nasa_reviews.xml', 'nasa_meta.xml'], destdir });

    expect(results.map(result => [result.name, result.status, result.error])).toEqual([
      ['nasa_reviews.xml', 'failed', '403: Forbidden'],
      ['nasa_meta.xml', 'downloaded', undefined],
    ]);
    expect(await fs.pathExists(path.join(destdir, 'nasa', 'nasa_reviews.xml'))).toBe(false);
  });
});
