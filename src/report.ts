import * as fs from 'fs'
import type { RecoveryResult } from './recovery'

export function reportFileName( now: Date = new Date() ): string {
    return `recovery-report-${now.toISOString()}.json`
}

// Saves a JSON file describing what the run created, for follow-up or cleanup
export function writeRecoveryReport( result: RecoveryResult, fileName: string = reportFileName() ): string {
    const reportContent = JSON.stringify( result, null, 2 )

    fs.writeFileSync( fileName, reportContent )
    console.log( `Recovery report saved to ${fileName}` )
    return fileName
}
