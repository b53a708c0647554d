/**
 * Services barrel export
 *
 * Service layer between the expansion core and the filesystem.
 */

// Writing salt-cloud configuration files
export * from './persistence-service';
