import { defineConfig } from 'vite';
import replace from '@rollup/plugin-replace';
import { execSync } from 'node:child_process';
import shebang from 'rollup-plugin-preserve-shebang';
import { fileURLToPath, URL } from 'node:url';

let gitInfo = {
    branch: '',
    commit: '',
};

try {
    gitInfo = {
        branch: execSync('git rev-parse --abbrev-ref HEAD').toString().trim(),
        commit: execSync('git rev-parse --short HEAD').toString().trim(),
    };
} catch {
    // eslint-disable-next-line no-console
    console.log('Directory does not have a Git repository, skipping git info');
}

export default defineConfig({
    plugins: [
        replace({
            '__VERSION__': process.env.npm_package_version ?? '0.0.0',
            '__GIT_BRANCH__': gitInfo.branch,
            '__GIT_COMMIT__': gitInfo.commit,
            '__SYSTEM_INFO__': `${process.platform} ${process.arch} ${process.version}`,
            preventAssignment: true,
        }),
        shebang({
            shebang: '#!/usr/bin/env node',
        }),
    ],
    build: {
        target: 'node20',
        outDir: 'dist',
        ssr: true,
        rollupOptions: {
            external: [
                'commander',
                'dotenv',
                'dotenv/config',
                'glob',
                'js-yaml',
                'openai',
                'winston',
                'zod',
                /^node:/,
            ],
            input: {
                main: 'src/main.ts',
            },
            output: {
                format: 'esm',
                entryFileNames: '[name].js',
                chunkFileNames: '[name].js',
            },
        },
        modulePreload: false,
        minify: false,
        sourcemap: true,
    },
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});
