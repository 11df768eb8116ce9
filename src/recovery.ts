import type { RecoveryConfig } from './config'
import type { Ec2Api } from './ec2Api'
import { ConfigurationError } from './errors'
import {
    applySecurityGroups,
    attachRecoveredVolumes,
    launchRecoveryInstance,
    powerOnRecoveryInstance,
    removeDefaultRootVolume,
    STATUS_OK,
    stopRecoveryInstance,
    waitForInstanceState,
} from './instances'
import type { ConnectionInfo, VolumeAttachment } from './instances'
import { fetchSnapshotAttributes } from './snapshots'
import type { SnapshotAttributes } from './snapshots'
import { cloneUserData, injectUserData } from './userData'
import { validateImageId, validateProvisioningKey, validateSecurityGroups, validateSubnet } from './validators'
import { planVolumes, rebuildVolumes } from './volumes'
import type { ReconstructedVolume, RebuildOptions, VolumePlan } from './volumes'

export type RecoveryOutcome = 'completed' | 'dry-run' | 'cancelled' | 'failed'

export interface RecoveryPlan {
    instanceName: string
    imageId: string
    instanceType: string
    subnetId: string
    buildZone: string
    volumeKind: string
    volumes: VolumePlan[]
    securityGroups: string[]
    userData: RecoveryConfig[ 'userData' ][ 'mode' ]
    powerOn: boolean
}

export interface RecoveryResult {
    outcome: RecoveryOutcome
    plan: RecoveryPlan
    instanceId?: string
    volumes: ReconstructedVolume[]
    attachments: VolumeAttachment[]
    removedRootVolumeId?: string
    securityGroupsApplied?: boolean
    // File path or source instance id the userData came from
    userDataSource?: string
    poweredOn: boolean
    connection?: ConnectionInfo
}

export interface RecoveryHooks {
    // Asked once, right before the first call that creates or changes anything
    confirm?: ( plan: RecoveryPlan ) => Promise<boolean>
    // Called with what exists so far when a step after confirmation fails; the error is rethrown afterwards
    onFailure?: ( partial: RecoveryResult, error: unknown ) => void
}

function buildZoneFor( config: RecoveryConfig, subnetZone: string ): string {
    if ( config.availabilityZone && config.availabilityZone !== subnetZone ) {
        throw new ConfigurationError( `Availability zone ${config.availabilityZone} does not match subnet '${config.subnetId}' in ${subnetZone}` )
    }
    return config.availabilityZone ?? subnetZone
}

function rebuildOptionsFor( config: RecoveryConfig ): RebuildOptions {
    return {
        tagNames: config.tagNames,
        iopsRatio: config.iopsRatio,
        volumeName: `Restore of ${config.searchValue}`,
    }
}

// Creates and wires everything, recording each resource on `result` as soon as it exists
async function performRecovery( config: RecoveryConfig, ec2Api: Ec2Api, snapshots: SnapshotAttributes, securityGroups: string[], result: RecoveryResult ): Promise<void> {
    result.volumes = await rebuildVolumes( ec2Api, result.plan.buildZone, config.volumeKind, snapshots, rebuildOptionsFor( config ) )

    const instanceId = await launchRecoveryInstance( ec2Api, {
        imageId: config.imageId,
        instanceType: config.instanceType,
        keyName: config.provisioningKey,
        subnetId: config.subnetId,
        availabilityZone: result.plan.buildZone,
        name: config.instanceName,
    } )
    result.instanceId = instanceId

    await waitForInstanceState( ec2Api, instanceId, STATUS_OK, config.poll )
    await stopRecoveryInstance( ec2Api, instanceId, config.poll )

    result.removedRootVolumeId = await removeDefaultRootVolume( ec2Api, instanceId, config.poll )
    result.attachments = await attachRecoveredVolumes( ec2Api, instanceId, result.volumes )

    if ( securityGroups.length > 0 ) {
        result.securityGroupsApplied = await applySecurityGroups( ec2Api, instanceId, securityGroups )
    }

    switch ( config.userData.mode ) {
        case 'file':
            await injectUserData( ec2Api, instanceId, config.userData.content )
            result.userDataSource = config.userData.path
            break
        case 'clone':
            result.userDataSource = await cloneUserData( ec2Api, instanceId, snapshots, config.tagNames.originalInstance )
            break
        case 'none':
            break
    }

    if ( config.powerOn ) {
        result.connection = await powerOnRecoveryInstance( ec2Api, instanceId, config.poll )
        result.poweredOn = true
    }

    console.log( `Recovery of '${config.searchValue}' into instance '${instanceId}' complete` )
}

export async function runRecovery( config: RecoveryConfig, ec2Api: Ec2Api, hooks: RecoveryHooks = {} ): Promise<RecoveryResult> {
    // Nothing below mutates EC2 until the plan is confirmed
    await validateImageId( ec2Api, config.imageId )
    const subnetZone = await validateSubnet( ec2Api, config.subnetId )
    const securityGroups = config.securityGroups ? await validateSecurityGroups( ec2Api, config.securityGroups ) : []
    await validateProvisioningKey( ec2Api, config.provisioningKey )

    const snapshots = await fetchSnapshotAttributes( ec2Api, config.tagNames.search, config.searchValue )

    const buildZone = buildZoneFor( config, subnetZone )
    console.log( `Building resources in: ${buildZone}` )

    const plan: RecoveryPlan = {
        instanceName: config.instanceName,
        imageId: config.imageId,
        instanceType: config.instanceType,
        subnetId: config.subnetId,
        buildZone,
        volumeKind: config.volumeKind,
        volumes: planVolumes( config.volumeKind, snapshots, rebuildOptionsFor( config ) ),
        securityGroups,
        userData: config.userData.mode,
        powerOn: config.powerOn,
    }
    const result: RecoveryResult = {
        outcome: 'completed',
        plan,
        volumes: [],
        attachments: [],
        poweredOn: false,
    }

    if ( config.dryRun ) {
        console.log( 'DRY RUN: Would recover instance with plan:' )
        console.dir( plan, { depth: null } )
        return { ...result, outcome: 'dry-run' }
    }

    if ( !config.assumeYes && hooks.confirm && !( await hooks.confirm( plan ) ) ) {
        console.log( 'Recovery cancelled, nothing was created' )
        return { ...result, outcome: 'cancelled' }
    }

    try {
        await performRecovery( config, ec2Api, snapshots, securityGroups, result )
    } catch ( error ) {
        hooks.onFailure?.( { ...result, outcome: 'failed' }, error )
        throw error
    }

    return result
}
