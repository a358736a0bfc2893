export { ArgumentError } from './ArgumentError';
export { FileSystemError } from './FileSystemError';
