// src/test/setup.ts
// Global test setup: plain output and no debug chatter unless asked for.
process.env.SCRIPTDECK_BORING = '1';
if (process.env.SCRIPTDECK_TEST_DEBUG !== '1') {
  delete process.env.SCRIPTDECK_DEBUG;
  delete process.env.SCRIPTDECK_STREAM_DEBUG;
}
