import type { Ec2Api } from './ec2Api'
import { ConfigurationError, isProviderError } from './errors'

export const MAX_SECURITY_GROUPS = 5
export const MIN_IO1_VOLUME_SIZE = 4
export const MIN_IOPS_RATIO = 3
export const MAX_IOPS_RATIO = 50
export const MIN_PROVISIONED_IOPS = 100
export const MAX_PROVISIONED_IOPS = 64000

// EC2 ids come in a legacy (8 hex) and a current (17 hex) flavour
const ID_HEX_LENGTHS = [ 8, 17 ]

export type ResourceIdProblem = 'length' | 'characters'

export function checkResourceIdFormat( prefix: string, value: string ): ResourceIdProblem | undefined {
    const hexLength = value.length - prefix.length
    if ( !ID_HEX_LENGTHS.includes( hexLength ) ) {
        return 'length'
    }
    const pattern = new RegExp( `^${prefix}[a-f0-9]{${hexLength}}$` )
    return pattern.test( value ) ? undefined : 'characters'
}

export async function validateImageId( ec2Api: Ec2Api, imageId: string ): Promise<string> {
    console.log( `Making sure requested AMI '${imageId}' is valid` )

    const problem = checkResourceIdFormat( 'ami-', imageId )
    if ( problem === 'length' ) {
        throw new ConfigurationError( `AMI id-string '${imageId}' is not a valid length` )
    }
    if ( problem === 'characters' ) {
        throw new ConfigurationError( `AMI id-string '${imageId}' contains invalid characters` )
    }

    try {
        await ec2Api.describeImage( imageId )
    } catch ( error ) {
        if ( isProviderError( error, 'NotFound' ) ) {
            throw new ConfigurationError( `AMI '${imageId}' not found`, { cause: error } )
        }
        throw error
    }

    console.log( `Requested AMI '${imageId}' is valid` )
    return imageId
}

// Returns the availability zone the subnet lives in
export async function validateSubnet( ec2Api: Ec2Api, subnetId: string ): Promise<string> {
    let availabilityZone: string | undefined
    try {
        availabilityZone = ( await ec2Api.describeSubnet( subnetId ) ).AvailabilityZone
    } catch ( error ) {
        if ( isProviderError( error, 'NotFound' ) ) {
            throw new ConfigurationError( `Subnet '${subnetId}' not found`, { cause: error } )
        }
        throw error
    }

    if ( !availabilityZone ) {
        throw new ConfigurationError( `Subnet '${subnetId}' reports no availability zone` )
    }

    console.log( `Subnet '${subnetId}' is in ${availabilityZone}` )
    return availabilityZone
}

// Splits a comma-separated list, keeping the first MAX_SECURITY_GROUPS entries in input order
export function parseSecurityGroupList( rawList: string ): string[] {
    const groups = rawList.split( ',' ).map( group => group.trim() )

    if ( groups.length > MAX_SECURITY_GROUPS ) {
        console.warn( `List of security-groups longer than ${MAX_SECURITY_GROUPS}, truncating` )
        for ( const dropped of groups.slice( MAX_SECURITY_GROUPS ) ) {
            console.warn( `Removing '${dropped}' from list` )
        }
    }

    return groups.slice( 0, MAX_SECURITY_GROUPS )
}

export async function validateSecurityGroups( ec2Api: Ec2Api, rawList: string ): Promise<string[]> {
    console.log( 'Validating list of security-groups' )
    const groups = parseSecurityGroupList( rawList )

    for ( const group of groups ) {
        const problem = checkResourceIdFormat( 'sg-', group )
        if ( problem === 'length' ) {
            throw new ConfigurationError( `Security-group '${group}' is not a valid string-length` )
        }
        if ( problem === 'characters' ) {
            throw new ConfigurationError( `Security-group '${group}' contains invalid characters` )
        }

        try {
            await ec2Api.describeSecurityGroup( group )
        } catch ( error ) {
            if ( isProviderError( error, 'NotFound' ) ) {
                throw new ConfigurationError( `Security-group '${group}' does not exist`, { cause: error } )
            }
            throw error
        }
        console.log( `Security-group '${group}' is valid` )
    }

    return groups
}

export async function validateProvisioningKey( ec2Api: Ec2Api, keyName: string ): Promise<string> {
    try {
        await ec2Api.describeKeyPair( keyName )
    } catch ( error ) {
        if ( isProviderError( error, 'NotFound' ) ) {
            throw new ConfigurationError( `Provisioning-key '${keyName}' not found`, { cause: error } )
        }
        throw error
    }

    console.log( `Provisioning-key '${keyName}' exists` )
    return keyName
}

// A ratio of 0 means "not provisioned", which io1 does not allow
export function validateIopsRatio( iopsRatio: number ): number {
    if ( iopsRatio === 0 ) {
        throw new ConfigurationError( 'Specified EBS-type io1 but failed to specify an IOPS-ratio' )
    }
    if ( iopsRatio < MIN_IOPS_RATIO || iopsRatio > MAX_IOPS_RATIO ) {
        throw new ConfigurationError( `IOPS-ratio ${iopsRatio} out of range: must be ${MIN_IOPS_RATIO}-${MAX_IOPS_RATIO}` )
    }
    return iopsRatio
}

// IOPS for an io1 volume rebuilt from a snapshot of `volumeSize` GiB
export function computeProvisionedIops( volumeSize: number, iopsRatio: number ): number {
    if ( volumeSize < MIN_IO1_VOLUME_SIZE ) {
        throw new ConfigurationError( `Requested volume-size [${volumeSize}] is less than minimum allowed [${MIN_IO1_VOLUME_SIZE}]` )
    }
    validateIopsRatio( iopsRatio )

    return Math.min( Math.max( volumeSize * iopsRatio, MIN_PROVISIONED_IOPS ), MAX_PROVISIONED_IOPS )
}
