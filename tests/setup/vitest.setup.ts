// Setup for the combined run: unit and integration tests share one process pool
import './vitest.int.setup.js';
