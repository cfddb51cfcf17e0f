import pluginChecker from "vite-plugin-checker";
import { defineConfig } from "vite";

// Sprites and sounds are fetched by URL at run time, so they are served
// from public/ untouched rather than imported and hashed.
export default defineConfig({
    plugins: [pluginChecker({ typescript: true, overlay: false })],
    base: "/",
    publicDir: "public",
    build: {
        outDir: "dist",
        target: "es2022",
        sourcemap: true,
        rollupOptions: {
            output: {
                entryFileNames: "js/[name].[hash].js",
                chunkFileNames: "js/[name].[hash].js",
                assetFileNames: "static/[name].[hash][extname]",
            },
        },
    },
});
