import { SSMClient } from '@aws-sdk/client-ssm'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { buildRecoveryConfig, getDefaultsFromSsm, mergeOptions, parseStoredDefaults } from '../config'
import type { RecoveryOptions } from '../config'
import { ConfigurationError, ProviderError } from '../errors'

const required: RecoveryOptions = {
    recoveryAmi: 'ami-0123456789abcdef0',
    provisioningKey: 'recovery-key',
    searchString: 'web-01',
    deploymentSubnet: 'subnet-0a1b2c3d',
    region: 'us-east-1',
}

const noFiles = (): string => {
    throw new Error( 'unexpected read' )
}

beforeEach( () => {
    vi.spyOn( console, 'log' ).mockImplementation( () => undefined )
    vi.spyOn( console, 'warn' ).mockImplementation( () => undefined )
} )

afterEach( () => {
    vi.restoreAllMocks()
} )

describe( 'buildRecoveryConfig', () => {
    it( 'fills in defaults', () => {
        const config = buildRecoveryConfig( required, noFiles )

        expect( config ).toMatchObject( {
            imageId: 'ami-0123456789abcdef0',
            volumeKind: 'gp2',
            iopsRatio: 0,
            instanceName: 'Recovery of web-01',
            instanceType: 't3.large',
            powerOn: false,
            searchValue: 'web-01',
            subnetId: 'subnet-0a1b2c3d',
            userData: { mode: 'none' },
            tagNames: {
                search: 'Snapshot Group',
                originalInstance: 'Original Instance',
                originalDevice: 'Original Attachment',
            },
            region: 'us-east-1',
            poll: { intervalMs: 10000, maxAttempts: 0 },
            dryRun: false,
            assumeYes: false,
            writeReport: false,
        } )
    } )

    it( 'takes alternate tag names and converts the poll interval to milliseconds', () => {
        const config = buildRecoveryConfig( {
            ...required,
            altSearchTag: 'Backup Set',
            altEc2Tag: 'Source',
            altDeviceTag: 'Mount',
            pollInterval: 2.5,
            maxPollAttempts: 30,
        }, noFiles )

        expect( config.tagNames ).toEqual( { search: 'Backup Set', originalInstance: 'Source', originalDevice: 'Mount' } )
        expect( config.poll ).toEqual( { intervalMs: 2500, maxAttempts: 30 } )
    } )

    it( 'is frozen', () => {
        const config = buildRecoveryConfig( required, noFiles )

        expect( Object.isFrozen( config ) ).toBe( true )
        expect( Object.isFrozen( config.tagNames ) ).toBe( true )
        expect( Object.isFrozen( config.poll ) ).toBe( true )
    } )

    it.each( [
        [ 'searchString', '--search-string' ],
        [ 'recoveryAmi', '--recovery-ami' ],
        [ 'provisioningKey', '--provisioning-key' ],
        [ 'deploymentSubnet', '--deployment-subnet' ],
    ] )( 'requires %s', ( key, flag ) => {
        const options: RecoveryOptions = { ...required, [ key ]: undefined }

        expect( () => buildRecoveryConfig( options, noFiles ) ).toThrow( `Missing required option ${flag}` )
    } )

    it( 'rejects an unknown instance type', () => {
        expect( () => buildRecoveryConfig( { ...required, instanceType: 't9.huge' }, noFiles ) )
            .toThrow( "Instance-type 't9.huge' is not a known EC2 instance-type" )
    } )

    it( 'requires a ratio for io1', () => {
        expect( () => buildRecoveryConfig( { ...required, ebsType: 'io1' }, noFiles ) )
            .toThrow( 'Specified EBS-type io1 but failed to specify an IOPS-ratio' )
        expect( buildRecoveryConfig( { ...required, ebsType: 'io1', iopsRatio: 10 }, noFiles ).iopsRatio ).toBe( 10 )
    } )

    it( 'ignores a ratio for gp2', () => {
        const config = buildRecoveryConfig( { ...required, iopsRatio: 10 }, noFiles )

        expect( config.volumeKind ).toBe( 'gp2' )
        expect( console.log ).toHaveBeenCalledWith( 'IOPS-ratio 10 is ignored for EBS-type gp2' )
    } )

    it( 'reads the userData file up front', () => {
        const reader = vi.fn( () => '#!/bin/sh\n' )
        const config = buildRecoveryConfig( { ...required, userDataFile: '/tmp/boot.sh' }, reader )

        expect( reader ).toHaveBeenCalledWith( '/tmp/boot.sh' )
        expect( config.userData ).toEqual( { mode: 'file', path: '/tmp/boot.sh', content: '#!/bin/sh\n' } )
    } )

    it( 'reports an unreadable userData file', () => {
        expect( () => buildRecoveryConfig( { ...required, userDataFile: '/missing' }, noFiles ) )
            .toThrow( 'Failed while opening /missing' )
    } )

    it( 'refuses both userData sources', () => {
        expect( () => buildRecoveryConfig( { ...required, userDataFile: '/tmp/boot.sh', userDataClone: true }, noFiles ) )
            .toThrow( ConfigurationError )
    } )

    it( 'accepts but ignores a root snapshot id', () => {
        const config = buildRecoveryConfig( { ...required, rootSnapid: 'snap-1234abcd' }, noFiles )

        expect( config.rootSnapshotId ).toBe( 'snap-1234abcd' )
        expect( console.warn ).toHaveBeenCalledWith( "Root snapshot 'snap-1234abcd' ignored: --root-snapid is not implemented yet" )
    } )

    it( 'rejects a negative ratio', () => {
        expect( () => buildRecoveryConfig( { ...required, iopsRatio: -1 }, noFiles ) ).toThrow( /^Invalid options: iopsRatio: / )
    } )
} )

describe( 'mergeOptions', () => {
    it( 'lets defined command-line values win', () => {
        const merged = mergeOptions(
            { instanceType: 'm5.large', accessGroups: 'sg-1a2b3c4d', powerOn: true },
            { instanceType: 't3.small', powerOn: undefined, searchString: 'web-01' },
        )

        expect( merged ).toEqual( {
            instanceType: 't3.small',
            accessGroups: 'sg-1a2b3c4d',
            powerOn: true,
            searchString: 'web-01',
        } )
    } )
} )

describe( 'parseStoredDefaults', () => {
    it( 'parses a JSON object of options', () => {
        expect( parseStoredDefaults( '/recovery/defaults', '{"deploymentSubnet":"subnet-0a1b2c3d","powerOn":true}' ) )
            .toEqual( { deploymentSubnet: 'subnet-0a1b2c3d', powerOn: true } )
    } )

    it( 'rejects malformed JSON', () => {
        expect( () => parseStoredDefaults( '/recovery/defaults', '{' ) ).toThrow( 'Parameter /recovery/defaults does not hold valid JSON' )
    } )

    it( 'rejects unknown keys and a nested parameter reference', () => {
        expect( () => parseStoredDefaults( '/recovery/defaults', '{"colour":"blue"}' ) )
            .toThrow( /^Parameter \/recovery\/defaults holds invalid defaults: / )
        expect( () => parseStoredDefaults( '/recovery/defaults', '{"defaultsParameter":"/other"}' ) )
            .toThrow( /^Parameter \/recovery\/defaults holds invalid defaults: / )
    } )
} )

describe( 'getDefaultsFromSsm', () => {
    it( 'loads and validates the stored blob', async () => {
        const ssmClient = new SSMClient( { region: 'us-east-1' } )
        vi.spyOn( ssmClient, 'send' ).mockImplementation( async () => ( { Parameter: { Value: '{"instanceType":"m5.large"}' } } ) )

        await expect( getDefaultsFromSsm( ssmClient, '/recovery/defaults' ) ).resolves.toEqual( { instanceType: 'm5.large' } )
    } )

    it( 'maps a missing parameter to a not-found provider error', async () => {
        const ssmClient = new SSMClient( { region: 'us-east-1' } )
        const missing = new Error( 'Parameter /recovery/defaults not found.' )
        missing.name = 'ParameterNotFound'
        vi.spyOn( ssmClient, 'send' ).mockRejectedValue( missing )

        const loading = getDefaultsFromSsm( ssmClient, '/recovery/defaults' )
        await expect( loading ).rejects.toBeInstanceOf( ProviderError )
        await expect( loading ).rejects.toMatchObject( { kind: 'NotFound', operation: 'GetParameter' } )
    } )

    it( 'rejects an empty parameter', async () => {
        const ssmClient = new SSMClient( { region: 'us-east-1' } )
        vi.spyOn( ssmClient, 'send' ).mockImplementation( async () => ( { Parameter: {} } ) )

        await expect( getDefaultsFromSsm( ssmClient, '/recovery/defaults' ) ).rejects.toThrow( 'Parameter /recovery/defaults not found or has no value' )
    } )
} )
