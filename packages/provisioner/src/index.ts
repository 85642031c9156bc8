export * from "./file-downloader.js";
export * from "./manifest.js";
export * from "./provisioner.js";
export * from "./release.js";
