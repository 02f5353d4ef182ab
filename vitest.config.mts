import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        environment: 'node',
        include: ['jenkins_probes/src/**/*.test.ts']
    }
})
