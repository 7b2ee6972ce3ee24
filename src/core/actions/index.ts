export { action, ActionSignal, type ActionOptions } from './action.js';
