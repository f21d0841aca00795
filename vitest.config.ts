import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        environment: 'node',
        include: ['modules/**/__tests__/**/*.test.ts'],
    },
})
