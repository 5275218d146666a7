/**
 * Scraper Configuration
 *
 * Static settings for template discovery and the guarded GitHub client.
 * Environment-dependent values live in env.ts.
 */

export const scraperConfig = {
    // Exact template filenames, in precedence order (ARM JSON before Bicep)
    templateFilenames: [
        'azuredeploy.json',
        'main.json',
        'template.json',
        'main.bicep',
        'azuredeploy.bicep',
        'template.bicep',
    ],

    // Sibling file read for display name and description
    metadataFilename: 'metadata.json',

    // One architecture per directory; a compiled main.json and its main.bicep are the same template
    onePerDirectory: true,

    // Retry settings
    retry: {
        initialDelay: 1000, // ms
        maxDelay: 30000, // ms
        backoffMultiplier: 2,
        // Floor for quota waits so a reset time in the past never busy-loops
        minRateLimitWait: 1000, // ms
    },

    // Request settings
    request: {
        userAgent: 'arch-scraper/1.2',
        apiVersion: '2022-11-28',
        timeout: 30000, // ms
    },

    // Default document cap for a scrape triggered through the API
    defaultLimit: 25,
} as const;
