// Jest setup file: mute console output during tests by default.
// Set environment variable SHOW_CONSOLE=1 to see logs while running tests.

if (!process.env.SHOW_CONSOLE) {
  const methods = ['log', 'info', 'warn', 'debug', 'error'] as const;
  methods.forEach((m) => {
    jest.spyOn(console, m).mockImplementation(() => {});
  });
}
