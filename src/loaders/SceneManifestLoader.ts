/**
 * SceneManifestLoader - Reads and validates scene manifest JSON files
 *
 * Manifest layout:
 * {
 *   "name": "desk",
 *   "textures": [{ "path": "textures/wood.jpg", "tag": "wood" }],
 *   "materials": [{ "tag": "wood", "diffuseColor": [r,g,b], "specularColor": [r,g,b], "shininess": 0.3 }],
 *   "lights": { "directional": {...} | null, "pointLights": [...] }
 * }
 *
 * Texture paths are relative to the manifest file.
 */

import fs from 'fs';
import path from 'path';
import type { MaterialDescriptor } from '../core/materials/MaterialRegistry';
import {
  MAX_POINT_LIGHTS,
  type DirectionalLightParams,
  type PointLightParams,
  type SerializedLightingRig,
} from '../core/lighting/LightingRig';
import type { Vec3 } from '../core/types';
import type { SceneManifest, TextureEntry } from './types';

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Field readers bound to one manifest source, so every error names the file and the field
 */
class ManifestReader {
  constructor(private readonly source: string) {}

  fail(field: string, expected: string): never {
    throw new Error(`Invalid scene manifest ${this.source}: ${field} must be ${expected}`);
  }

  object(value: unknown, field: string): JsonObject {
    return isObject(value) ? value : this.fail(field, 'an object');
  }

  array(value: unknown, field: string): unknown[] {
    return Array.isArray(value) ? value : this.fail(field, 'an array');
  }

  string(value: unknown, field: string): string {
    return typeof value === 'string' && value.length > 0 ? value : this.fail(field, 'a non-empty string');
  }

  number(value: unknown, field: string): number {
    return typeof value === 'number' && Number.isFinite(value) ? value : this.fail(field, 'a finite number');
  }

  boolean(value: unknown, field: string, fallback: boolean): boolean {
    if (value === undefined) return fallback;
    return typeof value === 'boolean' ? value : this.fail(field, 'a boolean');
  }

  vec3(value: unknown, field: string): Vec3 {
    if (!Array.isArray(value) || value.length !== 3) {
      return this.fail(field, 'an array of 3 numbers');
    }
    return [
      this.number(value[0], `${field}[0]`),
      this.number(value[1], `${field}[1]`),
      this.number(value[2], `${field}[2]`),
    ];
  }
}

function parseTexture(reader: ManifestReader, value: unknown, field: string, baseDir: string): TextureEntry {
  const entry = reader.object(value, field);
  const file = reader.string(entry.path, `${field}.path`);
  return {
    path: path.resolve(baseDir, file),
    tag: reader.string(entry.tag, `${field}.tag`),
  };
}

function parseMaterial(reader: ManifestReader, value: unknown, field: string): MaterialDescriptor {
  const entry = reader.object(value, field);
  const tag = reader.string(entry.tag, `${field}.tag`);
  const diffuseColor = reader.vec3(entry.diffuseColor, `${field}.diffuseColor`);
  const specularColor = reader.vec3(entry.specularColor, `${field}.specularColor`);
  const shininess = reader.number(entry.shininess, `${field}.shininess`);
  if (shininess < 0) {
    reader.fail(`${field}.shininess`, 'zero or greater');
  }
  return { tag, diffuseColor, specularColor, shininess };
}

function parseDirectional(reader: ManifestReader, value: unknown, field: string): DirectionalLightParams | null {
  if (value === undefined || value === null) return null;
  const light = reader.object(value, field);
  const direction = reader.vec3(light.direction, `${field}.direction`);
  if (direction.every(c => c === 0)) {
    reader.fail(`${field}.direction`, 'a non-zero vector');
  }
  return {
    direction,
    ambient: reader.vec3(light.ambient, `${field}.ambient`),
    diffuse: reader.vec3(light.diffuse, `${field}.diffuse`),
    specular: reader.vec3(light.specular, `${field}.specular`),
    active: reader.boolean(light.active, `${field}.active`, true),
  };
}

function parsePointLight(reader: ManifestReader, value: unknown, field: string): PointLightParams {
  const light = reader.object(value, field);
  return {
    position: reader.vec3(light.position, `${field}.position`),
    ambient: reader.vec3(light.ambient, `${field}.ambient`),
    diffuse: reader.vec3(light.diffuse, `${field}.diffuse`),
    specular: reader.vec3(light.specular, `${field}.specular`),
    constant: reader.number(light.constant, `${field}.constant`),
    linear: reader.number(light.linear, `${field}.linear`),
    quadratic: reader.number(light.quadratic, `${field}.quadratic`),
    active: reader.boolean(light.active, `${field}.active`, true),
  };
}

function parseLights(reader: ManifestReader, value: unknown): SerializedLightingRig {
  if (value === undefined) {
    return { directional: null, pointLights: [] };
  }
  const lights = reader.object(value, 'lights');
  const points = lights.pointLights === undefined ? [] : reader.array(lights.pointLights, 'lights.pointLights');
  if (points.length > MAX_POINT_LIGHTS) {
    reader.fail('lights.pointLights', `at most ${MAX_POINT_LIGHTS} entries`);
  }
  return {
    directional: parseDirectional(reader, lights.directional, 'lights.directional'),
    pointLights: points.map((p, i) => parsePointLight(reader, p, `lights.pointLights[${i}]`)),
  };
}

/**
 * Validate parsed manifest JSON.
 * @param baseDir - Directory texture paths are resolved against
 * @param source - Label used in error messages
 * @throws Error naming the source and the first invalid field
 */
export function parseSceneManifest(data: unknown, baseDir: string, source = 'scene manifest'): SceneManifest {
  const reader = new ManifestReader(source);
  const root = reader.object(data, 'root');

  const textures = reader
    .array(root.textures ?? [], 'textures')
    .map((t, i) => parseTexture(reader, t, `textures[${i}]`, baseDir));
  const materials = reader
    .array(root.materials ?? [], 'materials')
    .map((m, i) => parseMaterial(reader, m, `materials[${i}]`));

  return {
    name: root.name === undefined ? path.basename(source, '.json') : reader.string(root.name, 'name'),
    textures,
    materials,
    lights: parseLights(reader, root.lights),
  };
}

/**
 * Read a manifest file from disk
 * @throws Error when the file is unreadable, not JSON, or invalid
 */
export async function loadSceneManifest(file: string): Promise<SceneManifest> {
  const absolute = path.resolve(file);
  let text: string;
  try {
    text = await fs.promises.readFile(absolute, 'utf8');
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read scene manifest ${absolute}: ${errorMsg}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse scene manifest ${absolute}: ${errorMsg}`);
  }

  return parseSceneManifest(data, path.dirname(absolute), absolute);
}
