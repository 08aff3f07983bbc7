export { Parser, parse } from './parser';
