export {
  ShaderStateStager,
  type ShaderStateSnapshot,
  type StagedMaterial,
  type ObjectDrawState,
} from './ShaderStateStager';
