export { RasterError, RasterErrorCode } from './types';
export type { RasterProvider } from './types';
