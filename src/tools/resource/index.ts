/**
 * Resource Tools
 */

export {
  createResource,
  deleteResource,
  descriptorFor,
  getResource,
  listResources,
  parseManifest,
  resourceTools,
} from './tool';
export * from './schema';
