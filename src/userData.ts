import type { Ec2Api } from './ec2Api'
import { ConfigurationError, RecoveryError } from './errors'
import type { SnapshotAttributes } from './snapshots'
import { SOURCE_INSTANCE_TAG } from './tagUtils'

export async function injectUserData( ec2Api: Ec2Api, instanceId: string, content: Uint8Array | string ): Promise<void> {
    console.log( `Injecting userData into instance '${instanceId}'` )
    const bytes = typeof content === 'string' ? Buffer.from( content, 'utf8' ) : content
    await ec2Api.setUserData( instanceId, bytes )
}

// Every snapshot in a group is assumed to come from the same instance, so the first record decides
export function resolveSourceInstanceId( snapshots: SnapshotAttributes, originalInstanceTag: string ): string {
    const first = snapshots.entries().next()
    if ( first.done ) {
        throw new ConfigurationError( 'No snapshots to determine the source instance from' )
    }

    const [ snapshotId, record ] = first.value
    const sourceInstanceId = record.tags[ SOURCE_INSTANCE_TAG ] ?? record.tags[ originalInstanceTag ]
    if ( !sourceInstanceId ) {
        throw new ConfigurationError( `Unable to determine source instance-id from snapshot '${snapshotId}'` )
    }
    return sourceInstanceId
}

// Copies userData from the instance the snapshots were taken of onto the recovery-instance
export async function cloneUserData( ec2Api: Ec2Api, instanceId: string, snapshots: SnapshotAttributes, originalInstanceTag: string ): Promise<string> {
    const sourceInstanceId = resolveSourceInstanceId( snapshots, originalInstanceTag )
    console.log( `Cloning userData from instance '${sourceInstanceId}'` )

    const encoded = await ec2Api.getUserData( sourceInstanceId )
    if ( !encoded ) {
        throw new RecoveryError( `Instance '${sourceInstanceId}' has no userData to clone` )
    }

    await injectUserData( ec2Api, instanceId, Buffer.from( encoded, 'base64' ) )
    return sourceInstanceId
}
