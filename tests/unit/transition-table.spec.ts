import { TransitionTable } from '../../src/engines/transition-table';
import { ConfigurationError } from '../../src/errors/configuration.error';
import { createLoanWorkflow } from '../fixtures/loan-application.workflow';

describe('TransitionTable', () => {
  const table = new TransitionTable(createLoanWorkflow());

  it('should expose the configured destinations for a state', () => {
    expect([...table.outgoing('SUBMITTED')]).toEqual([
      'BACKGROUND_CHECK',
      'REJECTED',
    ]);
    expect([...table.outgoing('FUNDS_ALLOCATED')]).toEqual(['COMPLETED']);
  });

  it('should return an empty set for terminal states', () => {
    expect(table.outgoing('COMPLETED').size).toBe(0);
    expect(table.outgoing('REJECTED').size).toBe(0);
  });

  it('should answer structural validity ignoring guards', () => {
    expect(table.isStructurallyValid('SUBMITTED', 'BACKGROUND_CHECK')).toBe(
      true,
    );
    expect(table.isStructurallyValid('SUBMITTED', 'APPROVED')).toBe(false);
    expect(table.isStructurallyValid('FUNDS_ALLOCATED', 'REJECTED')).toBe(
      false,
    );
    expect(table.isStructurallyValid('COMPLETED', 'COMPLETED')).toBe(false);
  });

  it('should classify terminal states', () => {
    expect(table.isTerminal('COMPLETED')).toBe(true);
    expect(table.isTerminal('REJECTED')).toBe(true);
    expect(table.isTerminal('APPROVED')).toBe(false);
    expect(table.terminalKind('COMPLETED')).toBe('completed');
    expect(table.terminalKind('REJECTED')).toBe('rejected');
    expect(table.terminalKind('APPROVED')).toBeNull();
  });

  it('should recognise only declared states', () => {
    expect(table.has('CERTIFICATION')).toBe(true);
    expect(table.has('ARCHIVED')).toBe(false);
  });

  it('should keep declaration order for states and edges', () => {
    expect(table.workflowId).toBe('loan-application');
    expect(table.initial).toBe('SUBMITTED');
    expect(table.states[0]).toBe('SUBMITTED');
    expect(table.states).toHaveLength(8);

    const edges = table.edges();
    expect(edges).toHaveLength(11);
    expect(edges[0]).toEqual({ from: 'SUBMITTED', to: 'BACKGROUND_CHECK' });
    expect(edges[edges.length - 1]).toEqual({
      from: 'FUNDS_ALLOCATED',
      to: 'COMPLETED',
    });
  });

  it('should fail construction for a malformed graph', () => {
    expect(
      () =>
        new TransitionTable({
          id: 'unreachable-completion',
          states: ['SUBMITTED', 'BACKGROUND_CHECK', 'REJECTED', 'COMPLETED'],
          initial: 'SUBMITTED',
          transitions: {
            SUBMITTED: ['BACKGROUND_CHECK', 'REJECTED'],
            BACKGROUND_CHECK: ['REJECTED'],
          },
          terminal: { completed: ['COMPLETED'], rejected: ['REJECTED'] },
        }),
    ).toThrow(ConfigurationError);
  });
});
