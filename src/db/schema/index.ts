export { monsterRecords } from './monster-records.js';
