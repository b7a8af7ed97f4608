/**
 * Context Tools
 * Registers kubeconfig files and tracks the current cluster and namespace
 */

export {
  contextTools,
  deleteContext,
  describeContext,
  formatContextInfo,
  getCurrentContext,
  listContexts,
  loadKubeconfig,
  renameContext,
  setNamespace,
  switchContext,
} from './tool';
export * from './schema';
