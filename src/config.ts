import { _InstanceType } from '@aws-sdk/client-ec2'
import { GetParameterCommand, SSMClient } from '@aws-sdk/client-ssm'
import * as fs from 'fs'
import { z } from 'zod'
import { SUPPORTED_VOLUME_KINDS } from './ec2Api'
import type { VolumeKind } from './ec2Api'
import { ConfigurationError, ProviderError } from './errors'
import { DEFAULT_POLL_OPTIONS } from './poll'
import type { PollOptions } from './poll'
import { ORIGINAL_ATTACHMENT_TAG, ORIGINAL_INSTANCE_TAG } from './tagUtils'
import { validateIopsRatio } from './validators'

export const DEFAULT_SEARCH_TAG = 'Snapshot Group'
export const DEFAULT_VOLUME_KIND: VolumeKind = 'gp2'
export const DEFAULT_INSTANCE_TYPE = 't3.large'
export const DEFAULT_REGION = 'us-east-1'

export const recoveryOptionsSchema = z.object( {
    recoveryAmi: z.string().min( 1 ).optional(),
    ebsType: z.string().min( 1 ).optional(),
    iopsRatio: z.coerce.number().int().min( 0 ).optional(),
    provisioningKey: z.string().min( 1 ).optional(),
    recoveryEc2name: z.string().min( 1 ).optional(),
    powerOn: z.boolean().optional(),
    rootSnapid: z.string().optional(),
    searchString: z.string().min( 1 ).optional(),
    deploymentSubnet: z.string().min( 1 ).optional(),
    availabilityZone: z.string().min( 1 ).optional(),
    instanceType: z.string().min( 1 ).optional(),
    userDataFile: z.string().min( 1 ).optional(),
    userDataClone: z.boolean().optional(),
    accessGroups: z.string().min( 1 ).optional(),
    altSearchTag: z.string().min( 1 ).optional(),
    altEc2Tag: z.string().min( 1 ).optional(),
    altDeviceTag: z.string().min( 1 ).optional(),
    region: z.string().min( 1 ).optional(),
    pollInterval: z.coerce.number().min( 0 ).optional(),
    maxPollAttempts: z.coerce.number().int().min( 0 ).optional(),
    dryRun: z.boolean().optional(),
    yes: z.boolean().optional(),
    report: z.boolean().optional(),
    defaultsParameter: z.string().min( 1 ).optional(),
} ).strict()

export type RecoveryOptions = z.infer<typeof recoveryOptionsSchema>

// Everything the SSM defaults blob may carry: any option except where to find the blob
export const storedDefaultsSchema = recoveryOptionsSchema.omit( { defaultsParameter: true } )

export type UserDataSource =
    | { readonly mode: 'none' }
    | { readonly mode: 'file', readonly path: string, readonly content: string }
    | { readonly mode: 'clone' }

export interface SnapshotTagNames {
    readonly search: string
    readonly originalInstance: string
    readonly originalDevice: string
}

export interface RecoveryConfig {
    readonly imageId: string
    readonly volumeKind: VolumeKind
    readonly iopsRatio: number
    readonly provisioningKey: string
    readonly instanceName: string
    readonly instanceType: _InstanceType
    readonly powerOn: boolean
    readonly rootSnapshotId?: string
    readonly searchValue: string
    readonly subnetId: string
    readonly availabilityZone?: string
    readonly securityGroups?: string
    readonly userData: UserDataSource
    readonly tagNames: SnapshotTagNames
    readonly region: string
    readonly poll: Readonly<PollOptions>
    readonly dryRun: boolean
    readonly assumeYes: boolean
    readonly writeReport: boolean
}

export type TextFileReader = ( path: string ) => string

const KNOWN_INSTANCE_TYPES: ReadonlySet<string> = new Set( Object.values( _InstanceType ) )

function isInstanceType( value: string ): value is _InstanceType {
    return KNOWN_INSTANCE_TYPES.has( value )
}

function isVolumeKind( value: string ): value is VolumeKind {
    return SUPPORTED_VOLUME_KINDS.some( kind => kind === value )
}

function requireOption( value: string | undefined, flag: string ): string {
    if ( !value ) {
        throw new ConfigurationError( `Missing required option ${flag}` )
    }
    return value
}

function readTextFileSync( path: string ): string {
    return fs.readFileSync( path, 'utf8' )
}

function resolveUserData( options: RecoveryOptions, readTextFile: TextFileReader ): UserDataSource {
    if ( options.userDataClone && options.userDataFile ) {
        throw new ConfigurationError( '`-u` and `-U` are mutually-exclusive options' )
    }
    if ( options.userDataClone ) {
        return { mode: 'clone' }
    }
    if ( !options.userDataFile ) {
        return { mode: 'none' }
    }

    // Read early so a bad path fails before anything is created
    let content: string
    try {
        content = readTextFile( options.userDataFile )
    } catch ( error ) {
        throw new ConfigurationError( `Failed while opening ${options.userDataFile}`, { cause: error } )
    }
    return { mode: 'file', path: options.userDataFile, content }
}

// Turns merged CLI/SSM options into the immutable configuration a run is driven by
export function buildRecoveryConfig( rawOptions: RecoveryOptions, readTextFile: TextFileReader = readTextFileSync ): RecoveryConfig {
    const parsed = recoveryOptionsSchema.safeParse( rawOptions )
    if ( !parsed.success ) {
        throw new ConfigurationError( `Invalid options: ${formatIssues( parsed.error )}` )
    }
    const options = parsed.data

    const userData = resolveUserData( options, readTextFile )

    const volumeKind = options.ebsType ?? DEFAULT_VOLUME_KIND
    if ( !isVolumeKind( volumeKind ) ) {
        throw new ConfigurationError( `Requested volume-type '${volumeKind}' not currently supported` )
    }

    const iopsRatio = options.iopsRatio ?? 0
    if ( volumeKind === 'io1' ) {
        validateIopsRatio( iopsRatio )
    } else if ( iopsRatio > 0 ) {
        console.log( `IOPS-ratio ${iopsRatio} is ignored for EBS-type ${volumeKind}` )
    }

    const instanceType = options.instanceType ?? DEFAULT_INSTANCE_TYPE
    if ( !isInstanceType( instanceType ) ) {
        throw new ConfigurationError( `Instance-type '${instanceType}' is not a known EC2 instance-type` )
    }

    if ( options.rootSnapid ) {
        console.warn( `Root snapshot '${options.rootSnapid}' ignored: --root-snapid is not implemented yet` )
    }

    const searchValue = requireOption( options.searchString, '--search-string' )

    const config: RecoveryConfig = {
        imageId: requireOption( options.recoveryAmi, '--recovery-ami' ),
        volumeKind,
        iopsRatio,
        provisioningKey: requireOption( options.provisioningKey, '--provisioning-key' ),
        instanceName: options.recoveryEc2name ?? `Recovery of ${searchValue}`,
        instanceType,
        powerOn: options.powerOn ?? false,
        rootSnapshotId: options.rootSnapid,
        searchValue,
        subnetId: requireOption( options.deploymentSubnet, '--deployment-subnet' ),
        availabilityZone: options.availabilityZone,
        securityGroups: options.accessGroups,
        userData: Object.freeze( userData ),
        tagNames: Object.freeze( {
            search: options.altSearchTag ?? DEFAULT_SEARCH_TAG,
            originalInstance: options.altEc2Tag ?? ORIGINAL_INSTANCE_TAG,
            originalDevice: options.altDeviceTag ?? ORIGINAL_ATTACHMENT_TAG,
        } ),
        region: options.region ?? process.env.AWS_REGION ?? DEFAULT_REGION,
        poll: Object.freeze( {
            intervalMs: options.pollInterval !== undefined ? options.pollInterval * 1000 : DEFAULT_POLL_OPTIONS.intervalMs,
            maxAttempts: options.maxPollAttempts ?? DEFAULT_POLL_OPTIONS.maxAttempts,
        } ),
        dryRun: options.dryRun ?? false,
        assumeYes: options.yes ?? false,
        writeReport: options.report ?? false,
    }

    return Object.freeze( config )
}

// Command-line values win over stored defaults
export function mergeOptions( stored: RecoveryOptions, cli: RecoveryOptions ): RecoveryOptions {
    const merged: RecoveryOptions = { ...stored }
    for ( const [ key, value ] of Object.entries( cli ) ) {
        if ( value !== undefined ) {
            Object.assign( merged, { [ key ]: value } )
        }
    }
    return merged
}

export function parseStoredDefaults( parameterName: string, payload: string ): RecoveryOptions {
    let json: unknown
    try {
        json = JSON.parse( payload )
    } catch ( error ) {
        throw new ConfigurationError( `Parameter ${parameterName} does not hold valid JSON`, { cause: error } )
    }

    const parsed = storedDefaultsSchema.safeParse( json )
    if ( !parsed.success ) {
        throw new ConfigurationError( `Parameter ${parameterName} holds invalid defaults: ${formatIssues( parsed.error )}` )
    }
    return parsed.data
}

// Retrieves a JSON blob of option defaults from SSM Parameter Store
export async function getDefaultsFromSsm( ssmClient: SSMClient, parameterName: string ): Promise<RecoveryOptions> {
    const command = new GetParameterCommand( {
        Name: parameterName,
    } )

    let value: string | undefined
    try {
        const response = await ssmClient.send( command )
        value = response.Parameter?.Value
    } catch ( error ) {
        if ( error instanceof Error ) {
            const kind = error.name === 'ParameterNotFound' ? 'NotFound' : 'Rejected'
            throw new ProviderError( 'GetParameter', kind, error.message, { cause: error } )
        }
        throw new ProviderError( 'GetParameter', 'Rejected', String( error ), { cause: error } )
    }

    if ( !value ) {
        throw new ConfigurationError( `Parameter ${parameterName} not found or has no value` )
    }

    console.log( `Loaded option defaults from ${parameterName}` )
    return parseStoredDefaults( parameterName, value )
}

function formatIssues( error: z.ZodError ): string {
    return error.issues.map( issue => `${issue.path.join( '.' ) || '(root)'}: ${issue.message}` ).join( '; ' )
}
