import path from 'path';

/**
 * Centralized configuration for all test output directories.
 */

// Base directory for ALL test outputs
const TEST_OUTPUT_BASE = path.join(process.cwd(), '.test-outputs');

export const TestPaths = {
  base: TEST_OUTPUT_BASE,

  unit: {
    base: path.join(TEST_OUTPUT_BASE, 'unit'),
    configManager: path.join(TEST_OUTPUT_BASE, 'unit', 'config-manager'),
    fileUtils: path.join(TEST_OUTPUT_BASE, 'unit', 'file-utils'),
    upload: path.join(TEST_OUTPUT_BASE, 'unit', 'upload'),
    download: path.join(TEST_OUTPUT_BASE, 'unit', 'download'),
    cli: path.join(TEST_OUTPUT_BASE, 'unit', 'cli'),
  },

  fixtures: path.join(__dirname, 'fixtures'),
};

export function fixturePath(name: string): string {
  return path.join(TestPaths.fixtures, name);
}

