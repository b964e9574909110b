export type { ITemplateLoader } from './ITemplateLoader.js';
