/**
 * Google Provider Module
 *
 * Exports Google AI (Gemini) provider factory and related types.
 */

export { createGoogleProvider, GoogleProvider, type GoogleProviderConfig } from './factory';
