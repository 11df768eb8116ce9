import type { Ec2Api, RunInstanceRequest } from './ec2Api'
import { ProviderError, RecoveryError, isProviderError } from './errors'
import { pollUntil } from './poll'
import type { PollOptions } from './poll'
import type { ReconstructedVolume } from './volumes'

// Reported while an instance is running but EC2 has not published status checks yet
export const TRANSITIONING = 'TRANSITIONING'
export const STATUS_OK = 'ok'

export interface VolumeAttachment {
    volumeId: string
    device: string
}

export interface ConnectionInfo {
    privateDnsName?: string
    privateIpAddress?: string
    status: string
}

export async function launchRecoveryInstance( ec2Api: Ec2Api, request: RunInstanceRequest ): Promise<string> {
    console.log( `Launching recovery-instance '${request.name}' from '${request.imageId}' in ${request.availabilityZone}` )
    const instance = await ec2Api.runInstance( request )
    if ( !instance.InstanceId ) {
        throw new ProviderError( 'RunInstances', 'Rejected', 'EC2 returned an instance without an id' )
    }

    console.log( `Launched instance '${instance.InstanceId}'` )
    return instance.InstanceId
}

// Lifecycle state, except that a running instance reports its status-check result instead
export async function checkInstanceState( ec2Api: Ec2Api, instanceId: string ): Promise<string> {
    const instance = await ec2Api.describeInstance( instanceId )
    const lifecycleState = instance.State?.Name ?? 'unknown'

    if ( lifecycleState !== 'running' ) {
        return lifecycleState
    }

    const status = await ec2Api.describeInstanceStatus( instanceId )
    return status?.InstanceStatus?.Status ?? TRANSITIONING
}

export async function waitForInstanceState( ec2Api: Ec2Api, instanceId: string, targetState: string, poll: PollOptions ): Promise<void> {
    await pollUntil( `instance '${instanceId}' to reach ${targetState}`, poll, async () => {
        let currentState: string
        try {
            currentState = await checkInstanceState( ec2Api, instanceId )
        } catch ( error ) {
            // EC2 answers inconsistently for instances that only just changed state
            if ( isProviderError( error, 'NotFound' ) || isProviderError( error, 'Transient' ) ) {
                console.log( `Instance '${instanceId}' is pending` )
                return false
            }
            throw error
        }

        if ( currentState === targetState ) {
            console.log( `Instance '${instanceId}' reached ${targetState}` )
            return true
        }
        console.log( `Waiting for instance '${instanceId}' to reach ${targetState} (currently ${currentState})` )
        return false
    } )
}

export async function stopRecoveryInstance( ec2Api: Ec2Api, instanceId: string, poll: PollOptions ): Promise<void> {
    console.log( `Requesting stop of instance '${instanceId}'` )
    await ec2Api.stopInstance( instanceId )
    await waitForInstanceState( ec2Api, instanceId, 'stopped', poll )
}

// Detaches and deletes the root volume the instance was launched with; returns its id
export async function removeDefaultRootVolume( ec2Api: Ec2Api, instanceId: string, poll: PollOptions ): Promise<string> {
    const instance = await ec2Api.describeInstance( instanceId )
    const rootVolumeId = instance.BlockDeviceMappings?.[ 0 ]?.Ebs?.VolumeId
    if ( !rootVolumeId ) {
        throw new RecoveryError( `Instance '${instanceId}' has no block-device mapping to remove` )
    }

    console.log( `Detaching volume '${rootVolumeId}' from instance '${instanceId}'` )
    await ec2Api.detachVolume( instanceId, rootVolumeId )

    await pollUntil( `volume '${rootVolumeId}' to detach`, poll, async () => {
        const volume = await ec2Api.describeVolume( rootVolumeId )
        if ( volume.State === 'available' ) {
            return true
        }
        console.log( `Volume '${rootVolumeId}' is still ${volume.State ?? 'unknown'}` )
        return false
    } )
    console.log( `Volume '${rootVolumeId}' successfully detached` )

    console.log( `Cleaning up volume '${rootVolumeId}'` )
    await ec2Api.deleteVolume( rootVolumeId )

    // EC2 forgetting the id is the only confirmation a delete has finished
    await pollUntil( `volume '${rootVolumeId}' to be deleted`, poll, async () => {
        try {
            await ec2Api.describeVolume( rootVolumeId )
        } catch ( error ) {
            if ( isProviderError( error, 'NotFound' ) ) {
                return true
            }
            if ( !isProviderError( error, 'Transient' ) ) {
                throw error
            }
        }
        console.log( `Waiting for volume '${rootVolumeId}' to be deleted` )
        return false
    } )
    console.log( `Successfully deleted volume '${rootVolumeId}'` )

    return rootVolumeId
}

export async function attachRecoveredVolumes( ec2Api: Ec2Api, instanceId: string, volumes: ReconstructedVolume[] ): Promise<VolumeAttachment[]> {
    const attachments: VolumeAttachment[] = []

    for ( const volume of volumes ) {
        console.log( `Attaching volume '${volume.volumeId}' to instance '${instanceId}' at ${volume.originalDevice}` )
        await ec2Api.attachVolume( instanceId, volume.volumeId, volume.originalDevice )
        attachments.push( { volumeId: volume.volumeId, device: volume.originalDevice } )
    }

    return attachments
}

// A failure here is reported but does not stop the run
export async function applySecurityGroups( ec2Api: Ec2Api, instanceId: string, groupIds: string[] ): Promise<boolean> {
    console.log( `Attaching security-groups ${groupIds.join( ', ' )} to instance '${instanceId}'` )
    try {
        await ec2Api.modifySecurityGroups( instanceId, groupIds )
    } catch ( error ) {
        if ( !isProviderError( error ) ) {
            throw error
        }
        console.error( `Failed adding security-groups to instance '${instanceId}': ${error.message}` )
        return false
    }

    console.log( `Security-groups attached to instance '${instanceId}'` )
    return true
}

// Addresses plus the status EC2 reports right now, read the same way checkInstanceState does
export async function getConnectionInfo( ec2Api: Ec2Api, instanceId: string ): Promise<ConnectionInfo> {
    const instance = await ec2Api.describeInstance( instanceId )
    const lifecycleState = instance.State?.Name ?? 'unknown'
    const status = lifecycleState === 'running'
        ? ( await ec2Api.describeInstanceStatus( instanceId ) )?.InstanceStatus?.Status ?? TRANSITIONING
        : lifecycleState

    const info: ConnectionInfo = {
        privateDnsName: instance.PrivateDnsName,
        privateIpAddress: instance.PrivateIpAddress,
        status,
    }

    console.log( `Attach to recovery-instance at ${info.privateDnsName ?? '(no private name)'} (${info.privateIpAddress ?? 'no private address'})` )
    return info
}

export async function powerOnRecoveryInstance( ec2Api: Ec2Api, instanceId: string, poll: PollOptions ): Promise<ConnectionInfo> {
    console.log( `Requesting final power-on of instance '${instanceId}'` )
    await ec2Api.startInstance( instanceId )
    await waitForInstanceState( ec2Api, instanceId, STATUS_OK, poll )
    return getConnectionInfo( ec2Api, instanceId )
}
