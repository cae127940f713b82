/**
 * Config Module - Barrel Export
 */

export {
    type AppConfig,
    parseConfig,
    loadConfig,
} from './env';
