/**
 * Deployment Tools
 */

export { createDeployment, deploymentTools, listDeployments } from './tool';
export * from './schema';
