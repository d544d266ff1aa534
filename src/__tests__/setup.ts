process.env.NODE_ENV = 'test';

import { container } from '../container';
import { metrics } from '../services/metrics.service';

// Clear all cached instances before each test
beforeEach(() => {
  container.clearInstances();
  metrics.reset();
});
