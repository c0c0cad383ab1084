/**
 * Jest Global Setup
 *
 * Runs before every test file. tsyringe reads constructor metadata through
 * the Reflect API as soon as a decorated class loads, so `reflect-metadata`
 * has to be in place before any test imports the adapter or the connector.
 * In library code the same import sits at the top of index.ts and container.ts.
 */
import 'reflect-metadata';
