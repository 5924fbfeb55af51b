// Ports - interfaces for pluggable reflection and output

// Traversal ports
export * from './traversal';

// Output ports
export * from './output';
