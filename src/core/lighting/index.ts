export {
  LightingRig,
  MAX_POINT_LIGHTS,
  type DirectionalLightParams,
  type PointLightParams,
  type SerializedLightingRig,
} from './LightingRig';
