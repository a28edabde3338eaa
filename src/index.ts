// This module is a library entry point
// For CLI usage, run: npx romdeck <command>
// Or: npm run cli -- <command>

export * from "./types.js"
export * from "./config.js"
export * from "./identity.js"
export * from "./platforms.js"
export * from "./classify.js"
export * from "./title.js"
export * from "./format.js"
export * from "./scan/scanner.js"
export { walkLibrary, countLibraryItems, type WalkItem } from "./scan/walk.js"
export { pathSize } from "./scan/size.js"
export * from "./scan/stats.js"
export * from "./catalog/catalog.js"
export * from "./catalog/store.js"
export * from "./catalog/query.js"
export * from "./launch/args.js"
export * from "./launch/resolver.js"
export * from "./launch/process.js"
export * from "./launch/playtime.js"
export * from "./emulators/detect.js"
export * from "./emulators/registry.js"
export * from "./library.js"
