export { MaterialRegistry, type MaterialDescriptor, type MaterialLookup } from './MaterialRegistry';
