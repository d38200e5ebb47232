import type { Config } from 'tailwindcss';

const config: Config = {
  // Theme palettes live in src/config, so it is scanned with the components.
  content: ['./src/**/*.{ts,tsx}'],
  theme: {
    extend: {},
  },
  plugins: [],
};

export default config;
