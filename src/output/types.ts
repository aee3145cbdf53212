/**
 * Output Management Types
 */

export interface OutputConfig {
    outputDirectory: string;      // Default: ./output
    transcriptName: string;       // Transcript file name without extension
    now?: Date;                   // Fixes the run directory timestamp
}

export interface StageWriter {
    /** Directory every stage of this run is written to */
    readonly runDirectory: string;
    saveStage(stage: string, content: string): Promise<string>;
}
