import type { Snapshot } from '@aws-sdk/client-ec2'
import type { Ec2Api } from './ec2Api'
import { RecoveryError } from './errors'
import { tagsToRecord } from './tagUtils'

export interface SnapshotRecord {
    volumeSize: number
    tags: Record<string, string>
}

// Keyed by snapshot id, in the order EC2 returned them
export type SnapshotAttributes = ReadonlyMap<string, Readonly<SnapshotRecord>>

export function snapshotsToAttributes( snapshots: Snapshot[] ): SnapshotAttributes {
    const attributes = new Map<string, Readonly<SnapshotRecord>>()

    for ( const snapshot of snapshots ) {
        if ( !snapshot.SnapshotId ) {
            continue
        }
        attributes.set( snapshot.SnapshotId, Object.freeze( {
            volumeSize: snapshot.VolumeSize ?? 0,
            tags: Object.freeze( tagsToRecord( snapshot.Tags ) ),
        } ) )
    }

    return attributes
}

// Finds the snapshot group to rebuild from; an empty group stops the run
export async function fetchSnapshotAttributes( ec2Api: Ec2Api, searchTag: string, searchValue: string ): Promise<SnapshotAttributes> {
    console.log( `Searching for snapshots tagged '${searchTag}' = '${searchValue}'` )
    const snapshots = await ec2Api.describeSnapshotsByTag( searchTag, searchValue )

    const attributes = snapshotsToAttributes( snapshots )
    if ( attributes.size === 0 ) {
        throw new RecoveryError( 'Found no matching snapshots to reconstitute' )
    }

    for ( const [ snapshotId, record ] of attributes ) {
        console.log( `Found snapshot '${snapshotId}' (${record.volumeSize} GiB)` )
    }
    return attributes
}
