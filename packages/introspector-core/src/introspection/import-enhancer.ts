import type { ScriptIdentity, ScriptMetadata } from './schema.js';

/**
 * What an enhancer gets to look at besides the Safe-tier metadata.
 */
export interface ImportTarget {
    script: ScriptIdentity;
    source: string;
}

/**
 * The one step of the Import tier that may load or run the target script.
 * Implementations return the metadata to publish; throwing is allowed and is
 * recorded as an ImportError without losing the Safe-tier results.
 */
export interface ImportEnhancer {
    readonly name: string;
    enhance(metadata: ScriptMetadata, target: ImportTarget): Promise<ScriptMetadata>;
}

/**
 * Default enhancer. Performs no dynamic analysis yet and returns the metadata unchanged.
 */
export class PlaceholderImportEnhancer implements ImportEnhancer {
    public readonly name = 'placeholder';

    async enhance(metadata: ScriptMetadata, _target: ImportTarget): Promise<ScriptMetadata> {
        return metadata;
    }
}
