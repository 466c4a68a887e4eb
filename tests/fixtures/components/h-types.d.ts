// Declaration files are never loaded as components.
export {};
