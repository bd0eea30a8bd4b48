import { describe, it, expect } from 'vitest';
import {
  buildHeaders,
  encodeMetadataValue,
  metadataHeaderName,
  metadataHeaders,
  renderHeader,
} from '../ias3.js';
import { Credentials } from '../../auth/credentials.js';
import { ArchiveErrorKind, isErrorKind } from '../../errors/error.js';

describe('renderHeader', () => {
  it('should render flags as 1 and 0', () => {
    expect(renderHeader({ type: 'autoMakeBucket', enabled: true })).toEqual([['x-amz-auto-make-bucket', '1']]);
    expect(renderHeader({ type: 'queueDerive', enabled: false })).toEqual([['x-archive-queue-derive', '0']]);
    expect(renderHeader({ type: 'keepOldVersion', enabled: true })).toEqual([['x-archive-keep-old-version', '1']]);
    expect(renderHeader({ type: 'ignorePreexistingBucket', enabled: true })).toEqual([
      ['x-archive-ignore-preexisting-bucket', '1'],
    ]);
    expect(renderHeader({ type: 'cascadeDelete', enabled: false })).toEqual([['x-archive-cascade-delete', '0']]);
  });

  it('should render the size hint and authorization', () => {
    expect(renderHeader({ type: 'sizeHint', bytes: 1024 })).toEqual([['x-archive-size-hint', '1024']]);
    expect(renderHeader({ type: 'authorization', credentials: new Credentials('AK', 'SK') })).toEqual([
      ['authorization', 'LOW AK:SK'],
    ]);
  });

  it('should render a single metadata value', () => {
    expect(renderHeader({ type: 'metadata', name: 'Title', value: 'My Book' })).toEqual([
      ['x-archive-meta-title', 'My Book'],
    ]);
  });

  it('should number list values', () => {
    expect(renderHeader({ type: 'metadata', name: 'subject', value: ['maps', 'atlases'] })).toEqual([
      ['x-archive-meta00-subject', 'maps'],
      ['x-archive-meta01-subject', 'atlases'],
    ]);
  });
});

describe('metadataHeaderName', () => {
  it('should lowercase and double underscores', () => {
    expect(metadataHeaderName('Source_URL')).toBe('source--url');
  });

  it('should reject names that cannot be headers', () => {
    let thrown: unknown;
    try {
      metadataHeaderName('bad name');
    } catch (error) {
      thrown = error;
    }
    expect(isErrorKind(thrown, ArchiveErrorKind.Configuration)).toBe(true);
  });
});

describe('encodeMetadataValue', () => {
  it('should pass printable ASCII through', () => {
    expect(encodeMetadataValue('Hello, World!')).toBe('Hello, World!');
    expect(encodeMetadataValue(42)).toBe('42');
    expect(encodeMetadataValue(true)).toBe('true');
  });

  it('should percent-encode other values inside uri()', () => {
    expect(encodeMetadataValue('café')).toBe('uri(caf%C3%A9)');
    expect(encodeMetadataValue('a\nb')).toBe('uri(a%0Ab)');
  });
});

describe('metadataHeaders', () => {
  it('should keep the order of pairs', () => {
    const headers = metadataHeaders([
      ['collection', 'test_collection'],
      ['mediatype', 'texts'],
    ]);
    expect(headers.map((header) => (header.type === 'metadata' ? header.name : header.type))).toEqual([
      'collection',
      'mediatype',
    ]);
  });

  it('should accept a record', () => {
    expect(buildHeaders(metadataHeaders({ creator: 'Jane Doe' }))).toEqual({
      'x-archive-meta-creator': 'Jane Doe',
    });
  });
});

describe('buildHeaders', () => {
  it('should merge rendered headers with later ones winning', () => {
    expect(
      buildHeaders([
        { type: 'queueDerive', enabled: true },
        { type: 'sizeHint', bytes: 5 },
        { type: 'queueDerive', enabled: false },
      ])
    ).toEqual({
      'x-archive-queue-derive': '0',
      'x-archive-size-hint': '5',
    });
  });
});
