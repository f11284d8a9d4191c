export * from './types';
export * from './components';
export * from './deployment-config';
export * from './build-images';
export * from './push-images';
export * from './update-services';
export * from './local-stack';
export * from './registry-login';
export { createWorkflowContext } from './context';
export * from './inspect-repository';
