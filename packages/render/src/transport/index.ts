export { OutputPump, type OutputPumpMetrics } from './output-pump.js';
