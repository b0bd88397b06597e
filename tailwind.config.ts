import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      fontFamily: {
        sans: ['"Space Grotesk"', '"Avenir Next"', 'system-ui', 'sans-serif']
      }
    }
  },
  plugins: []
} satisfies Config;
