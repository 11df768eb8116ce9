#!/usr/bin/env node
import { cliEntrypoint } from './cli'
import { RecoveryError } from './errors'

if ( require.main === module ) {
    cliEntrypoint().catch( ( error: unknown ) => {
        if ( error instanceof RecoveryError ) {
            console.error( `ERROR: ${error.message}. Aborting...` )
        } else {
            console.error( error )
        }
        process.exit( 1 )
    } )
}
