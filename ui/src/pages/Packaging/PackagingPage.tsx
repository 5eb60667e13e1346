import React from 'react';
import { useForm } from 'react-hook-form';
import { zodResolver } from '@hookform/resolvers/zod';
import * as z from 'zod';
import toast from 'react-hot-toast';
import { useAppDispatch, useAppSelector } from '../../store/configureStore';
import { generateManifest, generatePackage, validatePackage } from '../../store/Packaging/slice';
import { PackageRequest } from '../../store/Packaging/types';
import {
  DEFAULT_PACKAGE_NAME,
  DEPLOYMENT_TARGETS,
  ENCRYPTION_LEVELS,
} from '../../constants/packaging';
import { countIncludedModules, estimatePackageSize } from '../../utils/packaging';
import { downloadPayload } from '../../utils/download';
import { describeError } from '../../utils/errors';

const packageSchema = z.object({
  packageName: z
    .string()
    .trim()
    .min(1, { message: 'Package name is required' }),
  includeFoundation: z.boolean(),
  includeEmployee: z.boolean(),
  includePayroll: z.boolean(),
  encryptPackage: z.boolean(),
  digitalSignature: z.boolean(),
  auditTrail: z.boolean(),
  encryptionLevel: z.enum(ENCRYPTION_LEVELS),
  deploymentTarget: z.enum(DEPLOYMENT_TARGETS),
  autoUpdate: z.boolean(),
  multiTenant: z.boolean(),
  apiEnabled: z.boolean(),
});

type PackageFormData = z.infer<typeof packageSchema>;

const DEFAULT_VALUES: PackageFormData = {
  packageName: DEFAULT_PACKAGE_NAME,
  includeFoundation: true,
  includeEmployee: true,
  includePayroll: true,
  encryptPackage: true,
  digitalSignature: true,
  auditTrail: true,
  encryptionLevel: 'AES-256',
  deploymentTarget: 'Cloud (Auto-Update)',
  autoUpdate: true,
  multiTenant: true,
  apiEnabled: true,
};

const toPackageRequest = (data: PackageFormData): PackageRequest => ({
  packageName: data.packageName,
  modules: {
    foundation: data.includeFoundation,
    employee: data.includeEmployee,
    payroll: data.includePayroll,
  },
  security: {
    encrypt: data.encryptPackage,
    digitalSignature: data.digitalSignature,
    auditTrail: data.auditTrail,
    encryptionLevel: data.encryptionLevel,
  },
  deployment: {
    target: data.deploymentTarget,
    autoUpdate: data.autoUpdate,
    multiTenant: data.multiTenant,
    apiEnabled: data.apiEnabled,
  },
});

const checkboxClass = 'mr-2 accent-blue-500';

const PackagingPage: React.FC = () => {
  const dispatch = useAppDispatch();
  const licensing = useAppSelector(s => s.Licensing);
  const packaging = useAppSelector(s => s.Packaging);

  const {
    register,
    handleSubmit,
    watch,
    getValues,
    formState: { errors },
  } = useForm<PackageFormData>({
    resolver: zodResolver(packageSchema),
    defaultValues: DEFAULT_VALUES,
  });

  const [includeFoundation, includeEmployee, includePayroll, encryptPackage] = watch([
    'includeFoundation',
    'includeEmployee',
    'includePayroll',
    'encryptPackage',
  ]);
  const modules = { foundation: includeFoundation, employee: includeEmployee, payroll: includePayroll };

  const onGeneratePackage = async (data: PackageFormData) => {
    try {
      await dispatch(generatePackage({ request: toPackageRequest(data), licensing })).unwrap();
      toast.success('✅ Package generated successfully!');
    } catch (error) {
      toast.error(`Package generation failed: ${describeError(error)}`);
    }
  };

  const onGenerateManifest = async (data: PackageFormData) => {
    try {
      await dispatch(generateManifest({ packageName: data.packageName, licensing })).unwrap();
      toast.success('✅ Manifest generated!');
    } catch (error) {
      toast.error(`Manifest generation failed: ${describeError(error)}`);
    }
  };

  const onValidate = async () => {
    try {
      await dispatch(validatePackage({ licensing, encryptionLevel: getValues('encryptionLevel') })).unwrap();
      toast.success('✅ Package validation completed!');
    } catch (error) {
      toast.error(`Validation failed: ${describeError(error)}`);
    }
  };

  return (
    <div className="space-y-6" data-testid="packaging-page">
      <form className="grid grid-cols-1 md:grid-cols-2 gap-6 text-sm text-slate-200" onSubmit={e => e.preventDefault()}>
        <div className="space-y-2">
          <h4 className="font-semibold text-slate-300">Package Configuration</h4>
          <label htmlFor="packageName" className="block text-slate-400">Package Name</label>
          <input
            id="packageName"
            className="w-full rounded bg-slate-800 border border-slate-700 px-3 py-2"
            {...register('packageName')}
          />
          {errors.packageName && (
            <p className="text-red-400 text-xs" role="alert">{errors.packageName.message}</p>
          )}
          <label className="block"><input type="checkbox" className={checkboxClass} {...register('includeFoundation')} />Include Foundation Module</label>
          <label className="block"><input type="checkbox" className={checkboxClass} {...register('includeEmployee')} />Include Employee Module</label>
          <label className="block"><input type="checkbox" className={checkboxClass} {...register('includePayroll')} />Include Payroll Module</label>

          <h4 className="font-semibold text-slate-300 pt-2">Security Settings</h4>
          <label className="block"><input type="checkbox" className={checkboxClass} {...register('encryptPackage')} />Encrypt Package</label>
          <label className="block"><input type="checkbox" className={checkboxClass} {...register('digitalSignature')} />Add Digital Signature</label>
          <label className="block"><input type="checkbox" className={checkboxClass} {...register('auditTrail')} />Include Audit Trail</label>
          <label htmlFor="encryptionLevel" className="block text-slate-400">Encryption Level</label>
          <select id="encryptionLevel" className="rounded bg-slate-800 border border-slate-700 px-3 py-2" {...register('encryptionLevel')}>
            {ENCRYPTION_LEVELS.map(level => <option key={level} value={level}>{level}</option>)}
          </select>
        </div>

        <div className="space-y-2">
          <h4 className="font-semibold text-slate-300">Deployment Settings</h4>
          <label htmlFor="deploymentTarget" className="block text-slate-400">Deployment Target</label>
          <select id="deploymentTarget" className="rounded bg-slate-800 border border-slate-700 px-3 py-2" {...register('deploymentTarget')}>
            {DEPLOYMENT_TARGETS.map(target => <option key={target} value={target}>{target}</option>)}
          </select>
          <label className="block"><input type="checkbox" className={checkboxClass} {...register('autoUpdate')} />Enable Auto-Updates</label>
          <label className="block"><input type="checkbox" className={checkboxClass} {...register('multiTenant')} />Multi-Tenant Support</label>
          <label className="block"><input type="checkbox" className={checkboxClass} {...register('apiEnabled')} />Enable API Access</label>

          <h4 className="font-semibold text-slate-300 pt-2">Package Contents</h4>
          <p data-testid="package-size"><strong>Estimated Package Size:</strong> {estimatePackageSize(modules)} MB</p>
          <p data-testid="package-components"><strong>Components:</strong> {countIncludedModules(modules)} modules</p>
          <p><strong>Security Level:</strong> {encryptPackage ? 'High' : 'Standard'}</p>
        </div>
      </form>

      <div className="grid grid-cols-1 md:grid-cols-3 gap-4 border-t border-slate-700 pt-4">
        <button
          type="button"
          onClick={handleSubmit(onGeneratePackage)}
          disabled={packaging.generating}
          className="px-4 py-2 rounded bg-blue-600 hover:bg-blue-500 text-white disabled:opacity-50"
        >
          {packaging.generating ? 'Generating package...' : '🎁 Generate Package'}
        </button>
        <button
          type="button"
          onClick={handleSubmit(onGenerateManifest)}
          disabled={packaging.generatingManifest}
          className="px-4 py-2 rounded bg-slate-700 hover:bg-slate-600 text-slate-200 disabled:opacity-50"
        >
          📋 Generate Manifest
        </button>
        <button
          type="button"
          onClick={onValidate}
          disabled={packaging.validating}
          className="px-4 py-2 rounded bg-slate-700 hover:bg-slate-600 text-slate-200 disabled:opacity-50"
        >
          {packaging.validating ? 'Validating package integrity...' : '🔍 Validate Package'}
        </button>
      </div>

      {packaging.lastPackage && (
        <div className="space-y-2">
          <button
            type="button"
            onClick={() => packaging.lastPackage && downloadPayload(packaging.lastPackage)}
            className="px-4 py-2 rounded bg-emerald-700 hover:bg-emerald-600 text-white text-sm"
          >
            📥 Download Package Manifest
          </button>
          <p className="text-xs text-slate-400">
            💡 <strong>Note:</strong> This is a demo version. The actual package would include all selected modules and be properly encrypted.
          </p>
        </div>
      )}

      {packaging.lastManifest && (
        <button
          type="button"
          onClick={() => packaging.lastManifest && downloadPayload(packaging.lastManifest)}
          className="px-4 py-2 rounded bg-emerald-700 hover:bg-emerald-600 text-white text-sm"
        >
          📥 Download Manifest
        </button>
      )}

      {packaging.validationResults && (
        <div className="space-y-1 text-sm">
          <ul data-testid="validation-results" className="space-y-1 text-slate-200">
            {packaging.validationResults.map(item => (
              <li key={item.check}>
                <strong>{item.check}:</strong> ✅ {item.result}
              </li>
            ))}
          </ul>
          <p className="text-xs text-slate-500">Placeholder checks: no package bytes are inspected.</p>
        </div>
      )}
    </div>
  );
};

export default PackagingPage;
