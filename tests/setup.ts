/**
 * Jest test setup file
 * Runs before each test file
 */

// Set test environment variables
process.env.NODE_ENV = 'test';

// Keep developer overrides out of config tests
for (const variable of Object.keys(process.env)) {
  if (variable.startsWith('BOSS_WIKI_')) {
    delete process.env[variable];
  }
}
