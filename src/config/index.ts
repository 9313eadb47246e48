/**
 * Configuration Module Entry Point
 */

export * from './types';
export * from './ConfigurationManager';
