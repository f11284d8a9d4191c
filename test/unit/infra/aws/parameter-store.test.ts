import { describe, it, expect, beforeEach, afterAll } from '@jest/globals';
import { mockClient } from 'aws-sdk-client-mock';
import { GetParameterCommand, ParameterNotFound, SSMClient } from '@aws-sdk/client-ssm';
import { createParameterStore } from '@/infra/aws/parameter-store';
import { createTestLogger } from '../../../__support__/utilities/logger';

const ssmMock = mockClient(SSMClient);

describe('ParameterStore', () => {
  const store = createParameterStore(new SSMClient({ region: 'us-east-1' }), createTestLogger());

  beforeEach(() => {
    ssmMock.reset();
  });

  afterAll(() => {
    ssmMock.restore();
  });

  it('should return the parameter value', async () => {
    ssmMock
      .on(GetParameterCommand, { Name: '/modernizer/cluster-name' })
      .resolves({ Parameter: { Name: '/modernizer/cluster-name', Value: 'modernizer-cluster' } });

    const result = await store.getParameter('/modernizer/cluster-name');

    expect(result).toEqual({ ok: true, value: 'modernizer-cluster' });
    expect(ssmMock.commandCalls(GetParameterCommand)).toHaveLength(1);
  });

  it('should fail on an empty value', async () => {
    ssmMock.on(GetParameterCommand).resolves({ Parameter: { Value: '' } });

    const result = await store.getParameter('/modernizer/backend-service');

    expect(result).toMatchObject({
      ok: false,
      error: 'Parameter /modernizer/backend-service is missing or empty',
    });
  });

  it('should report a parameter that does not exist', async () => {
    ssmMock
      .on(GetParameterCommand)
      .rejects(new ParameterNotFound({ message: 'Parameter not found', $metadata: {} }));

    const result = await store.getParameter('/modernizer/frontend-ecr-uri');

    expect(result).toMatchObject({
      ok: false,
      error: 'Failed to read parameter /modernizer/frontend-ecr-uri: Parameter not found',
      guidance: {
        message: 'Deployment parameter not found',
        resolution: 'Deploy the stacks first (`modernizer-ops deploy`) and check --region.',
      },
    });
  });
});
