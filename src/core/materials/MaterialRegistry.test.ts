import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MaterialRegistry, type MaterialDescriptor } from './MaterialRegistry';

const wood: MaterialDescriptor = {
  tag: 'wood',
  diffuseColor: [0.3, 0.2, 0.1],
  specularColor: [0.1, 0.1, 0.1],
  shininess: 0.3,
};

describe('MaterialRegistry', () => {
  let registry: MaterialRegistry;

  beforeEach(() => {
    registry = new MaterialRegistry();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('finds a registered material by tag', () => {
    registry.register(wood);

    const result = registry.lookup('wood');

    expect(result).toEqual({ material: wood, found: true, registryNonEmpty: true });
  });

  it('returns the first registered descriptor for a duplicate tag', () => {
    registry.register(wood);
    registry.register({ tag: 'wood', diffuseColor: [1, 1, 1], specularColor: [1, 1, 1], shininess: 99 });

    const result = registry.lookup('wood');

    expect(result.found).toBe(true);
    expect(result.material).toEqual(wood);
    expect(registry.size).toBe(2);
  });

  it('warns when a tag is shadowed', () => {
    registry.register(wood);
    registry.register(wood);

    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('reports a miss on a populated registry', () => {
    registry.register(wood);

    const result = registry.lookup('marble');

    expect(result).toEqual({ material: null, found: false, registryNonEmpty: true });
  });

  it('distinguishes an empty registry from a miss', () => {
    const result = registry.lookup('wood');

    expect(result).toEqual({ material: null, found: false, registryNonEmpty: false });
  });

  it('keeps insertion order', () => {
    registry.register({ ...wood, tag: 'a' });
    registry.register({ ...wood, tag: 'b' });
    registry.register({ ...wood, tag: 'c' });

    expect(registry.all().map(m => m.tag)).toEqual(['a', 'b', 'c']);
  });

  it('is not affected by later changes to the registered object', () => {
    const paper: MaterialDescriptor = {
      tag: 'paper',
      diffuseColor: [0.9, 0.9, 0.8],
      specularColor: [0.1, 0.1, 0.1],
      shininess: 10,
    };
    registry.register(paper);

    paper.diffuseColor[0] = 0;
    paper.shininess = 1;

    expect(registry.lookup('paper').material).toEqual({
      tag: 'paper',
      diffuseColor: [0.9, 0.9, 0.8],
      specularColor: [0.1, 0.1, 0.1],
      shininess: 10,
    });
  });

  it('hands out copies on lookup', () => {
    registry.register(wood);

    const first = registry.lookup('wood').material;
    if (first) first.shininess = 500;

    expect(registry.lookup('wood').material?.shininess).toBe(0.3);
  });
});
