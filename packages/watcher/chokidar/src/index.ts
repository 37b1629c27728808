export { ChokidarWatcher } from './chokidar-watcher.js';
