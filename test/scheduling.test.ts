import { adminNodeAffinity, adminTolerations } from '../lib/constructs/scheduling';
import { bastionUserData } from '../lib/constructs/bastion-host';

describe('admin scheduling', () => {
  test('requires nodes labelled purpose=admin', () => {
    expect(adminNodeAffinity().nodeAffinity.requiredDuringSchedulingIgnoredDuringExecution.nodeSelectorTerms).toEqual([
      { matchExpressions: [{ key: 'purpose', operator: 'In', values: ['admin'] }] },
    ]);
  });

  test('tolerates the admin NoSchedule taint', () => {
    expect(adminTolerations()).toEqual([{ key: 'purpose', operator: 'Equal', value: 'admin', effect: 'NoSchedule' }]);
  });

  test('returns a fresh object on every call', () => {
    expect(adminTolerations()).not.toBe(adminTolerations());
  });
});

describe('bastionUserData', () => {
  test('updates packages first and exports the region', () => {
    const commands = bastionUserData('eu-west-1');

    expect(commands[0]).toBe('yum update -y');
    expect(commands).toContain("echo 'export AWS_DEFAULT_REGION=eu-west-1' >> /home/ec2-user/.bashrc");
  });
});
