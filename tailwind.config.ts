import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        parchment: '#fbf7ee',
        ink: '#1f2933',
        gold: '#b7892f',
      },
      fontFamily: {
        hebrew: ['"David Libre"', '"Frank Ruhl Libre"', 'David', 'serif'],
      },
    },
  },
  plugins: [],
} satisfies Config;
