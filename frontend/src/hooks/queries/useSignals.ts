import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query';
import { api } from '../../utils/api';
import type { CheckResult, SignalCheckInput, SignalRecord } from '../../types/signal';

export function useSignalHistory(enabled: boolean) {
  return useQuery<SignalRecord[]>({
    queryKey: ['signals'],
    queryFn: () => api.get<SignalRecord[]>('/signals'),
    enabled,
    staleTime: 10_000,
  });
}

export function useCheckSignal() {
  const client = useQueryClient();
  return useMutation<CheckResult, Error, SignalCheckInput>({
    mutationFn: (input) => api.post<CheckResult>('/signals/check', input),
    onSuccess: () => client.invalidateQueries({ queryKey: ['signals'] }),
  });
}
