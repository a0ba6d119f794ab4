/** Shown when no source file is given */
export const DEFAULT_SNIPPET = `# Fibonacci numbers below 100
a, b = 0, 1
while a < 100:
    print(a)
    a, b = b, a + b
`;

export const DEFAULT_SNIPPET_PATH = "<snippet>";
