import {
    AttachVolumeCommand,
    CreateVolumeCommand,
    DeleteVolumeCommand,
    DescribeImagesCommand,
    DescribeInstanceAttributeCommand,
    DescribeInstancesCommand,
    DescribeInstanceStatusCommand,
    DescribeKeyPairsCommand,
    DescribeSecurityGroupsCommand,
    DescribeSubnetsCommand,
    DescribeVolumesCommand,
    DetachVolumeCommand,
    EC2Client,
    EC2ServiceException,
    ModifyInstanceAttributeCommand,
    paginateDescribeSnapshots,
    RunInstancesCommand,
    StartInstancesCommand,
    StopInstancesCommand,
} from '@aws-sdk/client-ec2'
import type {
    Image,
    Instance,
    InstanceStatus,
    KeyPairInfo,
    SecurityGroup,
    Snapshot,
    Subnet,
    Tag,
    Volume,
    _InstanceType,
} from '@aws-sdk/client-ec2'
import { ProviderError } from './errors'
import type { ProviderErrorKind } from './errors'

export const SUPPORTED_VOLUME_KINDS = [ 'gp2', 'io1' ] as const
export type VolumeKind = typeof SUPPORTED_VOLUME_KINDS[ number ]

export interface CreateVolumeRequest {
    snapshotId: string
    availabilityZone: string
    volumeKind: VolumeKind
    iops?: number
    tags: Tag[]
}

export interface RunInstanceRequest {
    imageId: string
    instanceType: _InstanceType
    keyName: string
    subnetId: string
    availabilityZone: string
    name: string
}

// The slice of the EC2 control plane a recovery run talks to. Every method either resolves
// or rejects with a ProviderError.
export interface Ec2Api {
    describeSnapshotsByTag( tagName: string, tagValue: string ): Promise<Snapshot[]>
    createVolume( request: CreateVolumeRequest ): Promise<Volume>
    describeVolume( volumeId: string ): Promise<Volume>
    deleteVolume( volumeId: string ): Promise<void>
    detachVolume( instanceId: string, volumeId: string ): Promise<void>
    attachVolume( instanceId: string, volumeId: string, device: string ): Promise<void>
    runInstance( request: RunInstanceRequest ): Promise<Instance>
    describeInstance( instanceId: string ): Promise<Instance>
    // Resolves undefined while EC2 has not yet published status checks for the instance
    describeInstanceStatus( instanceId: string ): Promise<InstanceStatus | undefined>
    startInstance( instanceId: string ): Promise<void>
    stopInstance( instanceId: string ): Promise<void>
    modifySecurityGroups( instanceId: string, groupIds: string[] ): Promise<void>
    // Base64 encoded, as EC2 returns it; undefined when the instance has none
    getUserData( instanceId: string ): Promise<string | undefined>
    setUserData( instanceId: string, content: Uint8Array ): Promise<void>
    describeImage( imageId: string ): Promise<Image>
    describeSubnet( subnetId: string ): Promise<Subnet>
    describeKeyPair( keyName: string ): Promise<KeyPairInfo>
    describeSecurityGroup( groupId: string ): Promise<SecurityGroup>
}

const TRANSIENT_ERROR_NAMES = new Set( [
    'RequestLimitExceeded',
    'Throttling',
    'ThrottlingException',
    'InternalError',
    'ServiceUnavailable',
    'Unavailable',
] )

// Maps whatever the SDK threw onto the three kinds the orchestration branches on
export function classifyEc2Failure( error: unknown ): ProviderErrorKind {
    if ( error instanceof EC2ServiceException ) {
        if ( error.name.endsWith( 'NotFound' ) ) {
            return 'NotFound'
        }
        if ( TRANSIENT_ERROR_NAMES.has( error.name ) || error.$retryable || error.$fault === 'server' ) {
            return 'Transient'
        }
        return 'Rejected'
    }
    // Anything that never reached EC2 (socket resets, timeouts)
    return 'Transient'
}

export function toProviderError( operation: string, error: unknown ): ProviderError {
    if ( error instanceof ProviderError ) {
        return error
    }
    const message = error instanceof Error ? error.message : String( error )
    return new ProviderError( operation, classifyEc2Failure( error ), message, { cause: error } )
}

export class Ec2ClientApi implements Ec2Api {
    constructor( private readonly ec2Client: EC2Client ) { }

    async describeSnapshotsByTag( tagName: string, tagValue: string ): Promise<Snapshot[]> {
        return this.call( 'DescribeSnapshots', async () => {
            const paginator = paginateDescribeSnapshots( { client: this.ec2Client }, {
                OwnerIds: [ 'self' ],
                Filters: [ {
                    Name: `tag:${tagName}`,
                    Values: [ tagValue ]
                } ]
            } )
            const snapshots: Snapshot[] = []

            for await ( const page of paginator ) {
                snapshots.push( ...( page.Snapshots ?? [] ) )
            }

            return snapshots
        } )
    }

    async createVolume( request: CreateVolumeRequest ): Promise<Volume> {
        return this.call( 'CreateVolume', () => this.ec2Client.send( new CreateVolumeCommand( {
            AvailabilityZone: request.availabilityZone,
            SnapshotId: request.snapshotId,
            VolumeType: request.volumeKind,
            Iops: request.iops,
            TagSpecifications: [ {
                ResourceType: 'volume',
                Tags: request.tags
            } ]
        } ) ) )
    }

    async describeVolume( volumeId: string ): Promise<Volume> {
        return this.call( 'DescribeVolumes', async () => {
            const response = await this.ec2Client.send( new DescribeVolumesCommand( { VolumeIds: [ volumeId ] } ) )
            const volume = response.Volumes?.[ 0 ]
            if ( !volume ) {
                throw new ProviderError( 'DescribeVolumes', 'NotFound', `Volume '${volumeId}' not found` )
            }
            return volume
        } )
    }

    async deleteVolume( volumeId: string ): Promise<void> {
        await this.call( 'DeleteVolume', () => this.ec2Client.send( new DeleteVolumeCommand( { VolumeId: volumeId } ) ) )
    }

    async detachVolume( instanceId: string, volumeId: string ): Promise<void> {
        await this.call( 'DetachVolume', () => this.ec2Client.send( new DetachVolumeCommand( {
            InstanceId: instanceId,
            VolumeId: volumeId
        } ) ) )
    }

    async attachVolume( instanceId: string, volumeId: string, device: string ): Promise<void> {
        await this.call( 'AttachVolume', () => this.ec2Client.send( new AttachVolumeCommand( {
            Device: device,
            InstanceId: instanceId,
            VolumeId: volumeId
        } ) ) )
    }

    async runInstance( request: RunInstanceRequest ): Promise<Instance> {
        return this.call( 'RunInstances', async () => {
            const response = await this.ec2Client.send( new RunInstancesCommand( {
                ImageId: request.imageId,
                InstanceType: request.instanceType,
                KeyName: request.keyName,
                MaxCount: 1,
                MinCount: 1,
                NetworkInterfaces: [ { DeviceIndex: 0, SubnetId: request.subnetId } ],
                Placement: { AvailabilityZone: request.availabilityZone },
                TagSpecifications: [ {
                    ResourceType: 'instance',
                    Tags: [ { Key: 'Name', Value: request.name } ]
                } ]
            } ) )
            const instance = response.Instances?.[ 0 ]
            if ( !instance ) {
                throw new ProviderError( 'RunInstances', 'Rejected', 'EC2 returned no instance' )
            }
            return instance
        } )
    }

    async describeInstance( instanceId: string ): Promise<Instance> {
        return this.call( 'DescribeInstances', async () => {
            const response = await this.ec2Client.send( new DescribeInstancesCommand( { InstanceIds: [ instanceId ] } ) )
            const instance = response.Reservations?.[ 0 ]?.Instances?.[ 0 ]
            if ( !instance ) {
                throw new ProviderError( 'DescribeInstances', 'NotFound', `Instance '${instanceId}' not found` )
            }
            return instance
        } )
    }

    async describeInstanceStatus( instanceId: string ): Promise<InstanceStatus | undefined> {
        return this.call( 'DescribeInstanceStatus', async () => {
            const response = await this.ec2Client.send( new DescribeInstanceStatusCommand( { InstanceIds: [ instanceId ] } ) )
            return response.InstanceStatuses?.[ 0 ]
        } )
    }

    async startInstance( instanceId: string ): Promise<void> {
        await this.call( 'StartInstances', () => this.ec2Client.send( new StartInstancesCommand( { InstanceIds: [ instanceId ] } ) ) )
    }

    async stopInstance( instanceId: string ): Promise<void> {
        await this.call( 'StopInstances', () => this.ec2Client.send( new StopInstancesCommand( { InstanceIds: [ instanceId ] } ) ) )
    }

    async modifySecurityGroups( instanceId: string, groupIds: string[] ): Promise<void> {
        await this.call( 'ModifyInstanceAttribute', () => this.ec2Client.send( new ModifyInstanceAttributeCommand( {
            InstanceId: instanceId,
            Groups: groupIds
        } ) ) )
    }

    async getUserData( instanceId: string ): Promise<string | undefined> {
        return this.call( 'DescribeInstanceAttribute', async () => {
            const response = await this.ec2Client.send( new DescribeInstanceAttributeCommand( {
                Attribute: 'userData',
                InstanceId: instanceId
            } ) )
            return response.UserData?.Value
        } )
    }

    async setUserData( instanceId: string, content: Uint8Array ): Promise<void> {
        // The SDK base64-encodes blob attributes on the way out
        await this.call( 'ModifyInstanceAttribute', () => this.ec2Client.send( new ModifyInstanceAttributeCommand( {
            InstanceId: instanceId,
            UserData: { Value: content }
        } ) ) )
    }

    async describeImage( imageId: string ): Promise<Image> {
        return this.call( 'DescribeImages', async () => {
            const response = await this.ec2Client.send( new DescribeImagesCommand( { ImageIds: [ imageId ] } ) )
            const image = response.Images?.[ 0 ]
            if ( !image ) {
                throw new ProviderError( 'DescribeImages', 'NotFound', `Image '${imageId}' not found` )
            }
            return image
        } )
    }

    async describeSubnet( subnetId: string ): Promise<Subnet> {
        return this.call( 'DescribeSubnets', async () => {
            const response = await this.ec2Client.send( new DescribeSubnetsCommand( { SubnetIds: [ subnetId ] } ) )
            const subnet = response.Subnets?.[ 0 ]
            if ( !subnet ) {
                throw new ProviderError( 'DescribeSubnets', 'NotFound', `Subnet '${subnetId}' not found` )
            }
            return subnet
        } )
    }

    async describeKeyPair( keyName: string ): Promise<KeyPairInfo> {
        return this.call( 'DescribeKeyPairs', async () => {
            const response = await this.ec2Client.send( new DescribeKeyPairsCommand( { KeyNames: [ keyName ] } ) )
            const keyPair = response.KeyPairs?.[ 0 ]
            if ( !keyPair ) {
                throw new ProviderError( 'DescribeKeyPairs', 'NotFound', `Key pair '${keyName}' not found` )
            }
            return keyPair
        } )
    }

    async describeSecurityGroup( groupId: string ): Promise<SecurityGroup> {
        return this.call( 'DescribeSecurityGroups', async () => {
            const response = await this.ec2Client.send( new DescribeSecurityGroupsCommand( { GroupIds: [ groupId ] } ) )
            const group = response.SecurityGroups?.[ 0 ]
            if ( !group ) {
                throw new ProviderError( 'DescribeSecurityGroups', 'NotFound', `Security group '${groupId}' not found` )
            }
            return group
        } )
    }

    private async call<T>( operation: string, request: () => Promise<T> ): Promise<T> {
        try {
            return await request()
        } catch ( error ) {
            throw toProviderError( operation, error )
        }
    }
}
