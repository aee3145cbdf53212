export * as Executor from './executor';
export * as Search from './search';
export * as Tools from './tools';
export * as Session from './session';
export { toResearchMarkdown, slugifyTitle, saveResearch } from './markdown';
export * from './types';
