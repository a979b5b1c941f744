export { FileSink, type FileSinkOptions } from './sinks/file.js';
