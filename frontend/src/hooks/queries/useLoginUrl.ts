import { useQuery } from '@tanstack/react-query';
import { api } from '../../utils/api';

export function useLoginUrl(enabled: boolean) {
  return useQuery<string>({
    queryKey: ['login-url'],
    queryFn: async () => (await api.get<{ url: string }>('/auth/login-url')).url,
    enabled,
    staleTime: Infinity,
  });
}
