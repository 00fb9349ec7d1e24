export { getConfig } from './environment-config';
