import type { RGB } from '../types';

/**
 * Phong material values staged into the scene shader
 */
export interface MaterialDescriptor {
  tag: string;
  diffuseColor: RGB;
  specularColor: RGB;
  shininess: number;
}

/**
 * Result of a material lookup.
 * `found` means the tag matched; `registryNonEmpty` only says whether any
 * material has been defined, so callers can tell the two misses apart.
 */
export interface MaterialLookup {
  material: MaterialDescriptor | null;
  found: boolean;
  registryNonEmpty: boolean;
}

const copyDescriptor = (descriptor: MaterialDescriptor): MaterialDescriptor => ({
  tag: descriptor.tag,
  diffuseColor: [...descriptor.diffuseColor],
  specularColor: [...descriptor.specularColor],
  shininess: descriptor.shininess,
});

/**
 * Append-only material table. Duplicate tags are accepted; the first one
 * registered wins every lookup.
 */
export class MaterialRegistry {
  private readonly materials: MaterialDescriptor[] = [];

  get size(): number {
    return this.materials.length;
  }

  all(): readonly MaterialDescriptor[] {
    return this.materials.map(copyDescriptor);
  }

  register(descriptor: MaterialDescriptor): void {
    if (this.materials.some(m => m.tag === descriptor.tag)) {
      console.warn(`[MaterialRegistry] Material "${descriptor.tag}" is already defined; the new entry is shadowed`);
    }
    this.materials.push(copyDescriptor(descriptor));
  }

  lookup(tag: string): MaterialLookup {
    if (this.materials.length === 0) {
      return { material: null, found: false, registryNonEmpty: false };
    }

    const match = this.materials.find(m => m.tag === tag);
    return {
      material: match ? copyDescriptor(match) : null,
      found: match !== undefined,
      registryNonEmpty: true,
    };
  }
}
