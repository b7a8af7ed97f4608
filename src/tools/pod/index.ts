/**
 * Pod Tools
 */

export { deletePod, getPod, listPods, podTools, streamLogs } from './tool';
export * from './schema';
