import type { Ec2Api, VolumeKind } from './ec2Api'
import type { SnapshotTagNames } from './config'
import { ConfigurationError, ProviderError, isProviderError } from './errors'
import type { SnapshotAttributes } from './snapshots'
import { buildProvenanceTags, tagsToRecord } from './tagUtils'
import { computeProvisionedIops } from './validators'

export interface VolumePlan {
    snapshotId: string
    volumeSize: number
    originalInstance: string
    originalDevice: string
    iops?: number
}

export interface ReconstructedVolume {
    volumeId: string
    state: string
    availabilityZone: string
    snapshotId: string
    originalInstance: string
    originalDevice: string
    tags: Record<string, string>
}

export interface RebuildOptions {
    tagNames: Pick<SnapshotTagNames, 'originalInstance' | 'originalDevice'>
    iopsRatio: number
    // Name tag for every rebuilt volume
    volumeName?: string
}

// Works out every volume up front so a bad snapshot stops the run before anything is created
export function planVolumes( volumeKind: VolumeKind, snapshots: SnapshotAttributes, options: RebuildOptions ): VolumePlan[] {
    const plans: VolumePlan[] = []
    const claimedDevices = new Map<string, string>()

    for ( const [ snapshotId, record ] of snapshots ) {
        const originalInstance = record.tags[ options.tagNames.originalInstance ]
        const originalDevice = record.tags[ options.tagNames.originalDevice ]
        if ( !originalInstance ) {
            throw new ConfigurationError( `Snapshot '${snapshotId}' has no '${options.tagNames.originalInstance}' tag` )
        }
        if ( !originalDevice ) {
            throw new ConfigurationError( `Snapshot '${snapshotId}' has no '${options.tagNames.originalDevice}' tag` )
        }

        const claimedBy = claimedDevices.get( originalDevice )
        if ( claimedBy ) {
            throw new ConfigurationError( `Snapshots '${claimedBy}' and '${snapshotId}' both claim device ${originalDevice}` )
        }
        claimedDevices.set( originalDevice, snapshotId )

        const plan: VolumePlan = { snapshotId, volumeSize: record.volumeSize, originalInstance, originalDevice }
        switch ( volumeKind ) {
            case 'io1':
                plan.iops = computeProvisionedIops( record.volumeSize, options.iopsRatio )
                break
            case 'gp2':
                break
            default: {
                const unsupported: never = volumeKind
                throw new ConfigurationError( `Requested volume-type '${String( unsupported )}' not currently supported` )
            }
        }
        plans.push( plan )
    }

    return plans
}

export async function rebuildVolumes( ec2Api: Ec2Api, buildZone: string, volumeKind: VolumeKind, snapshots: SnapshotAttributes, options: RebuildOptions ): Promise<ReconstructedVolume[]> {
    const plans = planVolumes( volumeKind, snapshots, options )
    const volumes: ReconstructedVolume[] = []

    for ( const plan of plans ) {
        console.log( `Creating ${volumeKind} volume from snapshot '${plan.snapshotId}'${plan.iops ? ` with ${plan.iops} IOPS` : ''}` )

        const tags = buildProvenanceTags( {
            originalInstance: plan.originalInstance,
            originalDevice: plan.originalDevice,
            name: options.volumeName,
        } )

        try {
            const created = await ec2Api.createVolume( {
                snapshotId: plan.snapshotId,
                availabilityZone: buildZone,
                volumeKind,
                iops: plan.iops,
                tags,
            } )
            if ( !created.VolumeId ) {
                throw new ProviderError( 'CreateVolume', 'Rejected', `No volume id returned for snapshot '${plan.snapshotId}'` )
            }

            volumes.push( {
                volumeId: created.VolumeId,
                state: created.State ?? 'creating',
                availabilityZone: created.AvailabilityZone ?? buildZone,
                snapshotId: plan.snapshotId,
                originalInstance: plan.originalInstance,
                originalDevice: plan.originalDevice,
                tags: tagsToRecord( created.Tags ?? tags ),
            } )
            console.log( `Created volume '${created.VolumeId}'` )
        } catch ( error ) {
            if ( isProviderError( error ) && volumes.length > 0 ) {
                console.error( `Volume creation failed; left behind for manual cleanup: ${volumes.map( volume => volume.volumeId ).join( ', ' )}` )
            }
            throw error
        }
    }

    return volumes
}
