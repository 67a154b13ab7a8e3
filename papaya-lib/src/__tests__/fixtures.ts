import type { JsonObject } from '../query';
import type { MetadataQueries } from '../source/queries';

export const OBJECT_URI = 'http://repo.test/rest/coll/7';

export const SOLR_DOC: JsonObject & { page_uris: string[] } = {
  id: OBJECT_URI,
  title__txt: 'Letters from the Lighthouse',
  date__edtf: '1887-05',
  rights__uri: 'http://rightsstatements.org/vocab/InC/1.0/',
  page_uris: [
    `${OBJECT_URI}/p/1`,
    `${OBJECT_URI}/p/2`,
    `${OBJECT_URI}/p/3`,
  ],
  page_image_ids: ['repo:coll:7:p1', 'repo:coll:7:p2', 'repo:coll:7:p3'],
  pages: [
    {
      id: `${OBJECT_URI}/p/1`,
      title: 'Envelope',
      files: [{ id: `${OBJECT_URI}/f/1` }, { id: `${OBJECT_URI}/f/2` }],
    },
    { id: `${OBJECT_URI}/p/2`, title: 'Letter, recto' },
    { id: `${OBJECT_URI}/p/3`, title: 'Letter, verso' },
  ],
  authors: [{ name: 'Ada Keeper' }, { name: '[@fr]Ada la Gardienne' }],
  sheet_count: 3,
  digitized: true,
  notes: null,
};

export const METADATA_QUERIES: MetadataQueries = {
  $uri: '.id',
  $label: '.title__txt',
  $date: '.date__edtf',
  $license_uri: '.rights__uri',
  $page_uris: '.page_uris[]',
  $page_image_ids: '.page_image_ids[]',
  '$*page_doc': '.pages[] | select(.id == $uri)',
  '$*page_label': '.pages[] | select(.id == $uri) | .title',
  '$*file_page_uri': '.pages[] | select(.files[]?.id == $uri) | .id',
  Title: '.title__txt',
  Author: '.authors[]?.name',
  Sheets: '.sheet_count',
  Digitized: '.digitized',
  Notes: '.notes',
  Pages: '.pages',
};
