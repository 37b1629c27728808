export { HocrParser } from './hocr-parser.js';
