import { describe, expect, it } from 'vitest';
import { parseTaskMessage } from './amqp';

describe('parseTaskMessage', () => {
  it('parses a task and defaults its data', () => {
    expect(parseTaskMessage(Buffer.from('{"taskId":"t1","action":"list_servers"}'))).toEqual({
      taskId: 't1',
      action: 'list_servers',
      data: {},
    });
  });

  it('keeps task arguments', () => {
    expect(parseTaskMessage('{"taskId":"t2","action":"get_server_details","data":{"server_id":"s1"}}')).toEqual({
      taskId: 't2',
      action: 'get_server_details',
      data: { server_id: 's1' },
    });
  });

  it('rejects bodies that are not JSON', () => {
    expect(parseTaskMessage('not json')).toBeNull();
  });

  it('rejects messages without an action', () => {
    expect(parseTaskMessage('{"taskId":"t3"}')).toBeNull();
  });
});
