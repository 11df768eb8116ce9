import type { Snapshot } from '@aws-sdk/client-ec2'
import { buildRecoveryConfig } from '../config'
import type { RecoveryConfig, RecoveryOptions } from '../config'
import { FakeEc2 } from './fakeEc2'
import type { FakeEc2Seed } from './fakeEc2'

export const IMAGE_ID = 'ami-0123456789abcdef0'
export const SUBNET_ID = 'subnet-0a1b2c3d'
export const ZONE = 'us-east-1a'
export const KEY_NAME = 'recovery-key'
export const LEGACY_GROUP = 'sg-1a2b3c4d'
export const CURRENT_GROUP = 'sg-0123456789abcdef0'
export const SOURCE_INSTANCE = 'i-aaa'

export interface GroupSnapshotOptions {
    group?: string
    size?: number
    instance?: string
    extraTags?: Record<string, string>
}

export function groupSnapshot( snapshotId: string, device: string, options: GroupSnapshotOptions = {} ): Snapshot {
    const tags: Record<string, string> = {
        'Snapshot Group': options.group ?? 'web-01',
        'Original Instance': options.instance ?? SOURCE_INSTANCE,
        'Original Attachment': device,
        ...options.extraTags,
    }
    return {
        SnapshotId: snapshotId,
        VolumeSize: options.size ?? 10,
        State: 'completed',
        Tags: Object.entries( tags ).map( ( [ Key, Value ] ) => ( { Key, Value } ) ),
    }
}

export function webSnapshots(): Snapshot[] {
    return [
        groupSnapshot( 'snap-0000000000000000f', '/dev/sdf' ),
        groupSnapshot( 'snap-0000000000000000a', '/dev/sdg' ),
    ]
}

export function seededEc2( seed: FakeEc2Seed = {} ): FakeEc2 {
    return new FakeEc2( {
        images: [ IMAGE_ID ],
        subnets: { [ SUBNET_ID ]: ZONE },
        keyPairs: [ KEY_NAME ],
        securityGroups: [ LEGACY_GROUP, CURRENT_GROUP ],
        snapshots: webSnapshots(),
        ...seed,
    } )
}

export const USER_DATA_SCRIPT = '#!/bin/bash\necho restored\n'

export function testConfig( overrides: RecoveryOptions = {} ): RecoveryConfig {
    return buildRecoveryConfig( {
        recoveryAmi: IMAGE_ID,
        provisioningKey: KEY_NAME,
        searchString: 'web-01',
        deploymentSubnet: SUBNET_ID,
        region: 'us-east-1',
        pollInterval: 0,
        yes: true,
        ...overrides,
    }, () => USER_DATA_SCRIPT )
}
