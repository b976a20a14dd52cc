/**
 * Error Handling Utilities
 *
 * This module provides centralized error management for the converter.
 * It defines standard error types, messages, and handling logic to ensure
 * consistent error reporting across the extractors, the storage layer and the main entry point.
 *
 * Malformed input never surfaces as one of these errors: extractors log a warning
 * and report "no result" instead. The errors below cover the infrastructure around them.
 */

import { ConverterConfig } from '../types';

/** Error header prefix for all error messages */
const ERRORHEADER = "[DocSpec]: ";

/**
 * Standard error types for the converter.
 * Use these to identify the kind of error being reported.
 */
export enum ConverterErrorType {
    /** File could not be found at the specified path */
    FILE_DOES_NOT_EXIST = 'FILE_DOES_NOT_EXIST',
    /** Specified location is a directory or is not reachable */
    LOCATION_NOT_FOUND = 'LOCATION_NOT_FOUND',
    /** Arguments passed to the function are missing or invalid */
    IMPROPER_ARGUMENTS = 'IMPROPER_ARGUMENTS',
    /** Requested object does not exist in the blob store */
    OBJECT_NOT_FOUND = 'OBJECT_NOT_FOUND',
    /** A persisted spec tree does not match the wire format */
    INVALID_SPEC = 'INVALID_SPEC',
    /** Requested output format is not supported */
    FORMAT_UNSUPPORTED = 'FORMAT_UNSUPPORTED'
}

/**
 * Lookup table for error messages.
 * Some entries are functions that take a parameter to build dynamic messages.
 */
const ERROR_MESSAGES: Record<ConverterErrorType, string | ((info: string) => string)> = {
    [ConverterErrorType.FILE_DOES_NOT_EXIST]: (filepath: string) => `File ${filepath} could not be found! Check if the file exists or verify if the relative path to the file is correct from your terminal's location.`,
    [ConverterErrorType.LOCATION_NOT_FOUND]: (location: string) => `Entered location ${location} is a directory or is not reachable.`,
    [ConverterErrorType.IMPROPER_ARGUMENTS]: `Improper arguments`,
    [ConverterErrorType.OBJECT_NOT_FOUND]: (objectPath: string) => `Object ${objectPath} does not exist in the blob store.`,
    [ConverterErrorType.INVALID_SPEC]: (details: string) => `The spec document is not valid: ${details}`,
    [ConverterErrorType.FORMAT_UNSUPPORTED]: (format: string) => `Output format ${format} is not supported. Use html or tiptap.`
};

/**
 * Creates a formatted error message for a specific error type.
 *
 * @param type - The type of error
 * @param info - Optional additional information (e.g., filepath, object key)
 * @returns The formatted error message string
 */
const createConverterError = (type: ConverterErrorType, info = ''): string => {
    const msg = ERROR_MESSAGES[type];
    return typeof msg === 'function' ? msg(info) : msg;
};

/**
 * Reads the message of anything that was thrown.
 */
export const getErrorMessage = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    return String(error);
};

/**
 * Creates, optionally logs to console, and returns a formatted converter error.
 *
 * @param type - The type of error
 * @param config - Converter configuration (checks outputErrorToConsole)
 * @param info - Optional additional information
 * @returns The Error object to be thrown
 */
export const getConverterError = (type: ConverterErrorType, config: ConverterConfig, info?: string): Error => {
    const message = createConverterError(type, info);
    if (config.outputErrorToConsole) {
        console.error(ERRORHEADER + message);
    }
    return new Error(ERRORHEADER + message);
};

/**
 * Wraps an existing error with converter context.
 * Errors that already carry the header are returned unchanged.
 *
 * @param error - The original error
 * @param config - Converter configuration
 * @param filePath - Optional file path for context
 * @returns The wrapped Error object to be thrown
 */
export const getWrappedError = (error: unknown, config: ConverterConfig, filePath?: string): Error => {
    const message = getErrorMessage(error);
    if (message.startsWith(ERRORHEADER) && error instanceof Error) {
        return error;
    }

    const wrapped = filePath ? `${filePath}: ${message}` : message;
    if (config.outputErrorToConsole) {
        console.error(ERRORHEADER + wrapped);
    }
    return new Error(ERRORHEADER + wrapped, { cause: error });
};

/**
 * Conditionally logs a warning message to the console.
 * Used for non-fatal errors that shouldn't stop the conversion.
 *
 * @param message - The warning message
 * @param config - Converter configuration
 * @param error - Optional original error object for more context
 */
export const logWarning = (message: string, config: ConverterConfig, error?: unknown): void => {
    if (config.outputErrorToConsole) {
        if (error) {
            console.warn(ERRORHEADER + message, error);
        } else {
            console.warn(ERRORHEADER + message);
        }
    }
};
