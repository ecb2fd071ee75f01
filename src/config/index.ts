import { config } from 'dotenv';
import { AppConfig } from '../types/catalog';
import { loadAppConfig } from './schema';

// Load environment variables
config();

export const appConfig: AppConfig = loadAppConfig(process.env);
