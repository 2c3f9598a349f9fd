export * from './types';
export * from './modules/codice-fiscale';
export * from './modules/partita-iva';
export * from './modules/municipality';
export { FiscalToolkitError, EncodingError, ConfigurationError } from './utils/errors';
