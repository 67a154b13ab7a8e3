import {
  FULL_IMAGE_PARAMS,
  ImageInfo,
  ImageParams,
  ImageService,
  ImageServiceError,
} from '../iiif/image';
import { imageInfoHandler, StubServer } from './helpers/stubServer';

describe('Image request parameters', () => {
  it('should default to the full image', () => {
    expect(FULL_IMAGE_PARAMS.toString()).toBe('/full/full/0/default.jpg');
  });

  it('should format custom parameters', () => {
    const params = new ImageParams({
      region: '0,0,100,100',
      size: '!200,200',
      format: 'png',
    });
    expect(`${params}`).toBe('/0,0,100,100/!200,200/0/default.png');
  });
});

describe('Image info', () => {
  it('should compute the aspect ratio', () => {
    const info = new ImageInfo('http://images.test/a', null, null, 400, 200);
    expect(info.aspectRatio).toBe(2);
  });
});

describe('The image service', () => {
  const server = new StubServer(() => ({ body: {} }));
  let images: ImageService;

  beforeAll(async () => {
    const url = await server.start();
    images = new ImageService(`${url}/iiif/`);
  });

  afterAll(() => server.stop());

  beforeEach(() => {
    server.requests.length = 0;
    server.handler = imageInfoHandler(() => server.url, {
      width: 1200,
      height: 800,
    });
  });

  it('should use the default thumbnail width', () => {
    expect(images.thumbnailWidth).toBe(250);
    expect(new ImageService('http://images.test', 120).thumbnailWidth).toBe(120);
  });

  it('should fetch the technical metadata of an image', async () => {
    const info = await images.getMetadata('repo:coll:7:p1');
    expect(server.requests.map((req) => req.path)).toEqual([
      '/iiif/repo:coll:7:p1',
    ]);
    expect(info.uri).toBe(`${server.url}/iiif/repo:coll:7:p1`);
    expect(info.context).toBe('http://iiif.io/api/image/2/context.json');
    expect(info.profile).toEqual(['http://iiif.io/api/image/2/level1.json']);
    expect(info.width).toBe(1200);
    expect(info.height).toBe(800);
    expect(info.aspectRatio).toBe(1.5);
  });

  it('should fail when the image server reports an error', async () => {
    server.handler = () => ({ status: 404, body: 'Not Found' });
    await expect(images.getMetadata('missing')).rejects.toThrow(
      new ImageServiceError(
        'Problem retrieving image missing, server returned status 404'
      )
    );
  });

  it('should fail on incomplete image information', async () => {
    server.handler = () => ({
      body: { '@id': `${server.url}/iiif/broken`, width: 100 },
    });
    await expect(images.getMetadata('broken')).rejects.toThrow(
      /^Invalid image info for broken: /
    );
  });

  it('should fail when the image server cannot be reached', async () => {
    const unreachable = new ImageService('http://127.0.0.1:1/iiif');
    await expect(unreachable.getMetadata('any')).rejects.toThrow(
      new ImageServiceError('Problem retrieving image any')
    );
  });
});
