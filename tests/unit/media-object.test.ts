import { describe, it, expect } from 'vitest';
import { BadRequestError, NotFoundError, UnsupportedError } from '../../src/errors.js';
import { MediaObject } from '../../src/objects/media-object.js';
import type { DetailParam } from '../../src/objects/types.js';
import type { AttributeNode } from '../../src/tree/attribute-node.js';
import { toInt } from '../../src/tree/casts.js';
import { FakeTransport, Genre, Movie, Show, el, makeClient } from './helpers.js';

const MOVIE_KEY = '/library/metadata/1';
const MOVIE_DETAILS = `${MOVIE_KEY}?includeBandwidths=1&includeChapters=1&includeFields=thumbBlurHash%2CartBlurHash`
  + '&includeGeolocation=1&includeLoudnessRamps=1&includeMarkers=1';

class Track extends MediaObject<{ title: string; index: number }> {
  static override readonly TAG = 'Track';

  protected override loadData(node: AttributeNode): void {
    this.setField('title', node.attr('title'));
    this.setField('index', toInt(node.attr('index')));
  }

  protected override includeParams(): Readonly<Record<string, DetailParam>> {
    return { includeChapters: 1, includeMarkers: 0, checkFiles: true };
  }

  protected override excludeParams(): Readonly<Record<string, DetailParam>> {
    return { excludeFields: 'summary', skipRefresh: 1 };
  }
}

class Counted extends MediaObject<{ title: string }> {
  static override readonly TAG = 'Video';

  computations = 0;

  private readonly upperTitle = this.cached('upperTitle', () => {
    this.computations += 1;
    return (this.node.attr('title') ?? '').toUpperCase();
  });

  get shout(): string {
    return this.upperTitle.value;
  }

  protected override loadData(node: AttributeNode): void {
    this.setField('title', node.attr('title'));
  }
}

function movieNode(attributes: Record<string, string> = {}, ...children: AttributeNode[]): AttributeNode {
  return el('Video', { type: 'movie', ratingKey: '1', key: MOVIE_KEY, title: 'Heat', ...attributes }, ...children);
}

describe('MediaObject construction', () => {
  const client = makeClient();

  it('populates identity and fields from the node', () => {
    const movie = new Movie(client, movieNode({ year: '1995', librarySectionID: '2' }));
    expect(movie.key).toBe(MOVIE_KEY);
    expect(movie.ratingKey).toBe(1);
    expect(movie.librarySectionID).toBe(2);
    expect(movie.peek('title')).toBe('Heat');
    expect(movie.peek('year')).toBe(1995);
    expect(movie.peek('summary')).toBeNull();
  });

  it('defaults the source path to the key', () => {
    expect(new Movie(client, movieNode()).sourcePath).toBe(MOVIE_KEY);
    expect(new Movie(client, movieNode(), '/library/sections/1/all').sourcePath).toBe('/library/sections/1/all');
  });

  it('builds the details path from the enabled include parameters, sorted by name', () => {
    expect(new Movie(client, movieNode()).detailsPath).toBe(MOVIE_DETAILS);
    expect(new Track(client, el('Track', { key: '/library/metadata/9' })).detailsPath)
      .toBe('/library/metadata/9?checkFiles=1&includeChapters=1');
  });

  it('uses the bare key when there are no detail parameters', () => {
    expect(new Genre(client, el('Genre', { key: '/library/sections/1/genre/5' })).detailsPath)
      .toBe('/library/sections/1/genre/5');
  });

  it('has no details path without a key', () => {
    expect(new Movie(client, el('Video', { title: 'Heat' })).detailsPath).toBeNull();
  });

  it('takes autoReload from the client configuration', () => {
    expect(new Movie(makeClient(new FakeTransport(), { autoReload: false }), movieNode()).autoReload).toBe(false);
  });
});

describe('MediaObject.reload', () => {
  it('fetches the details path and lets null clear fields', async () => {
    const transport = new FakeTransport()
      .on(MOVIE_DETAILS, el('MediaContainer', {}, movieNode({ title: 'Heat (1995)' })));
    const movie = new Movie(makeClient(transport), movieNode({ year: '1995', summary: 'Heist' }), '/library/sections/1/all');

    await movie.reload();

    expect(transport.paths()).toEqual([MOVIE_DETAILS]);
    expect(movie.peek('title')).toBe('Heat (1995)');
    expect(movie.peek('year')).toBeNull();
    expect(movie.peek('summary')).toBeNull();
    expect(movie.sourcePath).toBe(MOVIE_DETAILS);
  });

  it('resolves to the object itself', async () => {
    const transport = new FakeTransport().on(MOVIE_DETAILS, el('MediaContainer', {}, movieNode()));
    const movie = new Movie(makeClient(transport), movieNode());
    await expect(movie.reload()).resolves.toBe(movie);
  });

  it('fetches an explicit key instead', async () => {
    const transport = new FakeTransport().on('/library/metadata/1/alt', el('MediaContainer', {}, movieNode()));
    const movie = new Movie(makeClient(transport), movieNode());
    await movie.reload({ key: '/library/metadata/1/alt' });
    expect(transport.paths()).toEqual(['/library/metadata/1/alt']);
  });

  it('rebuilds the details path from parameter overrides for that reload only', async () => {
    const reloaded = '/library/metadata/9?excludeFields=summary&includeChapters=1&includeMarkers=1';
    const transport = new FakeTransport().on(reloaded, el('MediaContainer', {}, el('Track', { key: '/library/metadata/9' })));
    const track = new Track(makeClient(transport), el('Track', { key: '/library/metadata/9', title: 'Intro' }));

    await track.reload({ params: { includeMarkers: 1, excludeFields: true, checkFiles: false } });

    expect(transport.paths()).toEqual([reloaded]);
    expect(track.detailsPath).toBe('/library/metadata/9?checkFiles=1&includeChapters=1');
  });

  it('passes a non-boolean exclude override through as is', async () => {
    const reloaded = '/library/metadata/9?checkFiles=1&excludeFields=tagline&includeChapters=1';
    const transport = new FakeTransport().on(reloaded, el('MediaContainer', {}, el('Track', { key: '/library/metadata/9' })));
    const track = new Track(makeClient(transport), el('Track', { key: '/library/metadata/9' }));
    await track.reload({ params: { excludeFields: 'tagline' } });
    expect(transport.paths()).toEqual([reloaded]);
  });

  it('rejects with UnsupportedError without any path', async () => {
    const movie = new Movie(makeClient(), el('Video', { title: 'Heat' }));
    await expect(movie.reload()).rejects.toThrow(UnsupportedError);
    await expect(movie.reload()).rejects.toThrow('Cannot reload an object not built from a URL.');
  });

  it('rejects with NotFoundError when the response has no item', async () => {
    const transport = new FakeTransport()
      .on(MOVIE_DETAILS, el('MediaContainer'))
      .on('/library/metadata/1/empty', null);
    const movie = new Movie(makeClient(transport), movieNode());
    await expect(movie.reload()).rejects.toThrow(`No item returned from ${MOVIE_DETAILS}`);
    await expect(movie.reload({ key: '/library/metadata/1/empty' })).rejects.toThrow(NotFoundError);
  });

  it('propagates transport failures', async () => {
    const movie = new Movie(makeClient(new FakeTransport()), movieNode());
    await expect(movie.reload()).rejects.toThrow(NotFoundError);
  });
});

describe('cached fields', () => {
  it('are computed once and kept while the node is unchanged', async () => {
    const node = el('Video', { key: '/library/metadata/4', title: 'heat' });
    const transport = new FakeTransport().on('/library/metadata/4', el('MediaContainer', {}, node));
    const counted = new Counted(makeClient(transport), node);

    expect(counted.shout).toBe('HEAT');
    expect(counted.shout).toBe('HEAT');
    expect(counted.computations).toBe(1);

    await counted.reload();
    expect(counted.shout).toBe('HEAT');
    expect(counted.computations).toBe(1);
  });

  it('are recomputed after a reload brings a new node', async () => {
    const transport = new FakeTransport()
      .on('/library/metadata/4', el('MediaContainer', {}, el('Video', { key: '/library/metadata/4', title: 'ronin' })));
    const counted = new Counted(makeClient(transport), el('Video', { key: '/library/metadata/4', title: 'heat' }));

    expect(counted.shout).toBe('HEAT');
    await counted.reload();
    expect(counted.shout).toBe('RONIN');
    expect(counted.computations).toBe(2);
  });

  it('are listed by name', () => {
    const movie = new Movie(makeClient(), movieNode());
    expect(movie.cachedFieldNames()).toEqual(['genreCount']);
  });

  it('derive from the current node', async () => {
    const transport = new FakeTransport()
      .on(MOVIE_DETAILS, el('MediaContainer', {}, movieNode({}, el('Genre', { tag: 'Crime' }))));
    const movie = new Movie(makeClient(transport), movieNode({}, el('Genre', { tag: 'Crime' }), el('Genre', { tag: 'Drama' })));
    expect(movie.genreCount).toBe(2);
    await movie.reload();
    expect(movie.genreCount).toBe(1);
  });
});

describe('MediaObject relations and display', () => {
  const client = makeClient();

  it('isChildOf walks the parent chain', () => {
    const show = client.buildItem(el('Directory', { type: 'show', title: 'Lost' }), { variant: Show });
    const movie = client.buildItem(movieNode(), { parent: show });
    const genre = client.buildItem(el('Genre', { tag: 'Drama' }), { parent: movie });

    expect(genre.isChildOf({ etag: 'Directory' })).toBe(true);
    expect(genre.isChildOf({ etag: 'Video', title: 'Heat' })).toBe(true);
    expect(genre.isChildOf({ title: 'Other' })).toBe(false);
    expect(show.isChildOf({ etag: 'Directory' })).toBe(false);
  });

  it('firstAttr returns the first present attribute, empty strings included', () => {
    const genre = new Genre(client, el('Genre', { title: '', tag: 'Drama' }));
    expect(genre.firstAttr('title', 'tag')).toBe('');
    expect(genre.firstAttr('name', 'tag')).toBe('Drama');
    expect(genre.firstAttr('name')).toBeNull();
  });

  it('toString shows the class, an identifier and a cleaned name', () => {
    expect(String(new Movie(client, movieNode({ title: 'The Good the Bad' })))).toBe('<Movie:1:The-Good-the-Bad>');
    expect(String(new Movie(client, movieNode({ title: 'A Very Long Title For Testing' }))))
      .toBe('<Movie:1:A-Very-Long-Title-Fo>');
    expect(String(new Show(client, el('Directory', { key: '/library/metadata/3/children', title: 'Lost' }))))
      .toBe('<Show:3:Lost>');
    expect(String(new Genre(client, el('Genre', { tag: 'Crime' })))).toBe('<Genre:Crime>');
  });
});

describe('MediaObject fetch and load helpers', () => {
  it('fetchItem builds results with this object as parent', async () => {
    const transport = new FakeTransport().on(
      '/library/metadata/1/similar',
      el('MediaContainer', { size: '1' }, el('Video', { type: 'movie', ratingKey: '2', title: 'Ronin' })),
    );
    const client = makeClient(transport);
    const movie = new Movie(client, movieNode());

    const similar = await movie.fetchItem('/library/metadata/1/similar', { variant: Movie });

    expect(similar).toBeInstanceOf(Movie);
    expect(similar.peek('title')).toBe('Ronin');
    expect(similar.parent).toBe(movie);
    expect(similar.sourcePath).toBe('/library/metadata/1/similar');
  });

  it('findItems builds children of a node with this object as parent', () => {
    const movie = new Movie(makeClient(), movieNode({}, el('Genre', { tag: 'Crime' }), el('Genre', { tag: 'Drama' })));
    const genres = movie.findItems(movie.node, { variant: Genre });
    expect([...genres].map((genre) => genre.peek('tag'))).toEqual(['Crime', 'Drama']);
    expect([...genres].every((genre) => genre.parent === movie)).toBe(true);
  });

  it('loadXml materializes caller XML with this object as parent', () => {
    const movie = new Movie(makeClient(), movieNode());
    const genre = movie.loadXml('<Genre tag="Crime"/>', Genre);
    expect(genre?.peek('tag')).toBe('Crime');
    expect(genre?.parent).toBe(movie);
  });

  it('loadXml dispatches through the registry and returns null for unknown roots', () => {
    const client = makeClient();
    expect(client.loadXml('<Video type="movie" title="Heat"/>')).toBeInstanceOf(Movie);
    expect(client.loadXml('<Photo type="photo"/>')).toBeNull();
  });

  it('loadXml rejects malformed XML with BadRequestError', () => {
    expect(() => makeClient().loadXml('<Video title="Heat">')).toThrow(BadRequestError);
  });
});
