// Progress lines (🌐 💾 📂) go to console.log; silence them so test output stays readable.
// Warnings and errors stay visible unless a test spies on them.

const originalLog = console.log;

beforeAll(() => {
  console.log = jest.fn();
  // Settings from the shell must not reach the tests
  delete process.env.TRANSLATOR_CONFIG;
  delete process.env.OTLP_TRACES_URL;
});

afterAll(() => {
  console.log = originalLog;
});
