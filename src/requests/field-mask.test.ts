import { describe, it, expect } from 'vitest';
import { ImagePropertiesCodec } from '../model/styles';
import { dotSeparatedFieldList, fieldMask, prepareUpdatePayload } from './field-mask';
import { IMAGE_WRITABLE_KEYS } from './element-requests';

describe('dotSeparatedFieldList', () => {
  it('should emit one path per leaf', () => {
    expect(dotSeparatedFieldList({ outline: { weight: { magnitude: 1 } } })).toEqual(['outline.weight.magnitude']);
  });

  it('should skip nulls and empty objects and treat arrays as leaves', () => {
    expect(dotSeparatedFieldList({ a: {}, b: 1, c: [1, 2], d: { e: null }, f: false })).toEqual(['b', 'c', 'f']);
  });

  it('should never list a field that was null in the decoded payload', () => {
    const props = ImagePropertiesCodec.decode({ outline: { weight: { magnitude: 2 } }, shadow: null });
    const encoded = ImagePropertiesCodec.encode(props);

    expect(encoded).toEqual({ outline: { weight: { magnitude: 2 } }, shadow: null });
    expect(dotSeparatedFieldList(encoded)).toEqual(['outline.weight.magnitude']);
  });
});

describe('fieldMask', () => {
  it('should join paths with commas', () => {
    expect(fieldMask({ bold: true, fontSize: { magnitude: 12, unit: 'PT' } })).toBe(
      'bold,fontSize.magnitude,fontSize.unit'
    );
  });
});

describe('prepareUpdatePayload', () => {
  it('should strip propertyState at every depth and drop what becomes empty', () => {
    const payload = prepareUpdatePayload({
      outline: { propertyState: 'RENDERED', dashStyle: 'DOT' },
      shadow: { propertyState: 'NOT_RENDERED' },
    });
    expect(payload).toEqual({ outline: { dashStyle: 'DOT' } });
  });

  it('should keep only writable keys', () => {
    const props = ImagePropertiesCodec.decode({
      outline: { weight: { magnitude: 2 } },
      shadow: null,
      brightness: 0.3,
      link: { url: 'https://example.com' },
    });
    const payload = prepareUpdatePayload(ImagePropertiesCodec.encode(props), IMAGE_WRITABLE_KEYS);

    expect(payload).toEqual({ outline: { weight: { magnitude: 2 } }, link: { url: 'https://example.com' } });
    expect(fieldMask(payload)).toBe('outline.weight.magnitude,link.url');
  });
});
