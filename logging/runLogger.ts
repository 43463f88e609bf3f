// Diagnostics go to stderr so command output on stdout stays machine-readable.
export function logRun({
  component,
  input,
  output,
}: {
  component: string;
  input: unknown;
  output: unknown;
}): void {
  console.error(`[RUN:${component}]`, {
    input,
    output,
  });
}
