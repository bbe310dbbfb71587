import { CodecRegistry } from '../../../services/codec/registry';
import { FakeCodec } from '../../helpers/fake-codec';

describe('CodecRegistry', () => {
  let registry: CodecRegistry;

  beforeEach(() => {
    registry = new CodecRegistry();
  });

  it('should make the first registered codec the default', () => {
    const first = new FakeCodec('first');
    registry.register(first);
    registry.register(new FakeCodec('second'));

    expect(registry.getCodec()).toBe(first);
    expect(registry.getCodecNames()).toEqual(['first', 'second']);
    expect(registry.getCodecCount()).toBe(2);
  });

  it('should switch the default when asked', () => {
    registry.register(new FakeCodec('first'));
    const second = new FakeCodec('second');
    registry.register(second, { makeDefault: true });

    expect(registry.getCodec()).toBe(second);
  });

  it('should reject duplicate names', () => {
    registry.register(new FakeCodec('same'));

    expect(() => registry.register(new FakeCodec('same'))).toThrow("Codec with name 'same' is already registered");
  });

  it('should name the available codecs for an unknown lookup', () => {
    registry.register(new FakeCodec('first'));

    expect(() => registry.getCodec('other')).toThrow("Unknown codec 'other'. Available codecs: first");
  });

  it('should fail when nothing is registered', () => {
    expect(() => registry.getCodec()).toThrow('No codec registered');
  });

  it('should move the default on when it is unregistered', () => {
    registry.register(new FakeCodec('first'));
    const second = new FakeCodec('second');
    registry.register(second);

    expect(registry.unregister('first')).toBe(true);
    expect(registry.unregister('first')).toBe(false);
    expect(registry.getCodec()).toBe(second);
  });
});
