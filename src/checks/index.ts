// Built-in checks register themselves on import; order here is execution order.
import './lint.js';
import './complexity.js';
import './staleComment.js';
import './churn.js';
import './coverage.js';

export { defaultRegistry, registerCheck, CheckRegistry, type Check } from './registry.js';
